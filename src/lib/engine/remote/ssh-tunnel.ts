import * as http from 'http';
import type { Duplex } from 'stream';
import { Client as SSHClient, type ConnectConfig } from 'ssh2';
import { TransportError, errorMessage } from '@/lib/errors';
import { getLogger } from '@/lib/logger';

const READY_TIMEOUT = 30000;

export interface SshTarget {
  host: string;
  port: number;
  user: string;
  socketPath: string;
  privateKey?: Buffer;
}

/**
 * Opens a byte stream to a unix socket on the remote host
 */
export type StreamDialer = (socketPath: string) => Promise<Duplex>;

type ConnectionCallback = (err: Error | null, stream?: Duplex) => void;

/**
 * HTTP agent whose connections are forwarded to the engine socket named in
 * the ssh URI (direct-streamlocal), all sharing one ssh session.
 */
export class SshTunnel {
  readonly agent = new http.Agent();
  private session: Promise<SSHClient> | null = null;
  private client: SSHClient | null = null;

  constructor(
    private target: SshTarget,
    private dialer?: StreamDialer
  ) {
    Object.assign(this.agent, {
      createConnection: (_options: unknown, callback: ConnectionCallback) => this.open(callback),
    });
  }

  close(): void {
    this.agent.destroy();
    this.client?.end();
    this.client = null;
    this.session = null;
  }

  private open(callback: ConnectionCallback): void {
    const dial = this.dialer ?? ((socketPath: string) => this.forward(socketPath));
    const { user, host, socketPath } = this.target;
    void dial(socketPath).then(
      (stream) => callback(null, stream),
      (error: unknown) =>
        callback(new TransportError(`ssh ${user}@${host}: cannot reach ${socketPath}: ${errorMessage(error)}`, { cause: error }))
    );
  }

  private async forward(socketPath: string): Promise<Duplex> {
    const client = await this.connect();
    return new Promise((resolve, reject) => {
      client.openssh_forwardOutStreamLocal(socketPath, (err, channel) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(channel);
      });
    });
  }

  private connect(): Promise<SSHClient> {
    if (this.session) {
      return this.session;
    }

    const logger = getLogger('ssh');
    const { host, port, user, privateKey } = this.target;
    const connectConfig: ConnectConfig = {
      host,
      port,
      username: user,
      privateKey,
      agent: process.env.SSH_AUTH_SOCK,
      readyTimeout: READY_TIMEOUT,
    };

    this.session = new Promise<SSHClient>((resolve, reject) => {
      const client = new SSHClient();
      client.on('ready', () => {
        logger.debug({ host, port, user }, 'SSH session ready');
        this.client = client;
        resolve(client);
      });
      client.on('error', (err) => {
        logger.warn({ host, port, err }, 'SSH session failed');
        this.session = null;
        this.client = null;
        reject(err);
      });
      client.on('close', () => {
        this.session = null;
        this.client = null;
      });
      client.connect(connectConfig);
    });
    return this.session;
  }
}
