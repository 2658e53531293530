import * as net from 'net';
import { z } from 'zod';
import { TransportError, errorMessage } from '@/lib/errors';

const qmpMessageSchema = z.object({
  QMP: z.unknown().optional(),
  event: z.string().optional(),
  return: z.unknown().optional(),
  error: z
    .object({
      class: z.string(),
      desc: z.string(),
    })
    .optional(),
});

type QmpMessage = z.infer<typeof qmpMessageSchema>;

export class QmpCommandError extends Error {
  constructor(
    public command: string,
    public errorClass: string,
    desc: string
  ) {
    super(`QMP command ${command} failed: ${errorClass}: ${desc}`);
    this.name = 'QmpCommandError';
  }
}

/**
 * Minimal client for the QEMU Machine Protocol over a unix socket.
 * Commands are issued one at a time; asynchronous events are skipped.
 * The greeting and each command must complete within `timeoutMs`, after
 * which the socket is dropped and every later call fails.
 */
export class QmpClient {
  private buffer = '';
  private queue: QmpMessage[] = [];
  private waiters: Array<{ resolve: (msg: QmpMessage) => void; reject: (err: Error) => void }> = [];
  private failure: Error | null = null;

  private constructor(
    private socket: net.Socket,
    private timeoutMs: number
  ) {
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.onData(chunk));
    socket.on('error', (err) => this.fail(new TransportError(`QMP socket error: ${err.message}`, { cause: err })));
    socket.on('close', () => this.fail(new TransportError('QMP connection closed')));
  }

  /**
   * Connect, read the greeting and negotiate capabilities
   */
  static async connect(socketPath: string, timeoutMs = 5000): Promise<QmpClient> {
    const socket = await new Promise<net.Socket>((resolve, reject) => {
      const s = net.createConnection(socketPath);
      const timer = setTimeout(() => {
        s.destroy();
        reject(new TransportError(`QMP connection to ${socketPath} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      s.once('connect', () => {
        clearTimeout(timer);
        resolve(s);
      });
      s.once('error', (err) => {
        clearTimeout(timer);
        reject(err);
      });
    });

    const client = new QmpClient(socket, timeoutMs);
    try {
      const greeting = await client.nextMessage('greeting', Date.now() + timeoutMs);
      if (greeting.QMP === undefined) {
        throw new TransportError('QMP greeting not received');
      }
      await client.execute('qmp_capabilities');
    } catch (error) {
      client.close();
      throw error;
    }
    return client;
  }

  async execute(command: string, args?: Record<string, unknown>): Promise<unknown> {
    const payload = args ? { execute: command, arguments: args } : { execute: command };
    const deadline = Date.now() + this.timeoutMs;
    this.socket.write(`${JSON.stringify(payload)}\n`);

    for (;;) {
      const msg = await this.nextMessage(command, deadline);
      if (msg.event !== undefined) {
        continue;
      }
      if (msg.error) {
        throw new QmpCommandError(command, msg.error.class, msg.error.desc);
      }
      return msg.return;
    }
  }

  close(): void {
    this.socket.destroy();
  }

  private nextMessage(awaiting: string, deadline: number): Promise<QmpMessage> {
    const queued = this.queue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.fail(new TransportError(`QMP ${awaiting} timed out after ${this.timeoutMs}ms`));
        this.socket.destroy();
      }, Math.max(deadline - Date.now(), 0));
      this.waiters.push({
        resolve: (msg) => {
          clearTimeout(timer);
          resolve(msg);
        },
        reject: (err) => {
          clearTimeout(timer);
          reject(err);
        },
      });
    });
  }

  private onData(chunk: string): void {
    this.buffer += chunk;
    let idx = this.buffer.indexOf('\n');
    while (idx >= 0) {
      const line = this.buffer.slice(0, idx).trim();
      this.buffer = this.buffer.slice(idx + 1);
      if (line) {
        this.push(line);
      }
      idx = this.buffer.indexOf('\n');
    }
  }

  private push(line: string): void {
    let msg: QmpMessage;
    try {
      msg = qmpMessageSchema.parse(JSON.parse(line));
    } catch (error) {
      this.fail(new TransportError(`Malformed QMP message: ${errorMessage(error)}`));
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(msg);
    } else {
      this.queue.push(msg);
    }
  }

  private fail(error: Error): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }
}
