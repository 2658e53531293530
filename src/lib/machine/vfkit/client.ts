import * as http from 'http';
import { z } from 'zod';
import { TransportError } from '@/lib/errors';

const vmStateSchema = z.object({
  state: z.string(),
  canStart: z.boolean().optional(),
  canStop: z.boolean().optional(),
  canHardStop: z.boolean().optional(),
});

export type VfkitVMState = z.infer<typeof vmStateSchema>;

export type VfkitStateChange = 'Stop' | 'HardStop' | 'Pause' | 'Resume';

/**
 * Client for the vfkit/krunkit REST control endpoint.
 * Accepts `http://host:port` or `unix:///path/to/socket` endpoints.
 */
export class VfkitClient {
  private target: { socketPath: string } | { host: string; port: number };

  constructor(endpoint: string, private timeoutMs = 5000) {
    if (endpoint.startsWith('unix://')) {
      this.target = { socketPath: endpoint.slice('unix://'.length) };
    } else {
      const url = new URL(endpoint);
      if (url.protocol !== 'http:') {
        throw new TransportError(`Unsupported vfkit endpoint: ${endpoint}`);
      }
      this.target = { host: url.hostname, port: Number(url.port || 80) };
    }
  }

  async getState(): Promise<VfkitVMState> {
    const body = await this.request('GET', '/vm/state');
    const parsed = vmStateSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError('Unexpected vfkit state response');
    }
    return parsed.data;
  }

  async setState(state: VfkitStateChange): Promise<void> {
    await this.request('POST', '/vm/state', { state });
  }

  private request(method: string, path: string, data?: unknown): Promise<unknown> {
    return new Promise((resolve, reject) => {
      const options: http.RequestOptions = {
        ...this.target,
        method,
        path,
        timeout: this.timeoutMs,
        headers: {
          'Content-Type': 'application/json',
        },
      };

      const req = http.request(options, (res) => {
        let body = '';

        res.setEncoding('utf8');
        res.on('data', (chunk: string) => {
          body += chunk;
        });

        res.on('end', () => {
          const status = res.statusCode ?? 0;
          if (status < 200 || status >= 300) {
            reject(new TransportError(`vfkit ${method} ${path} returned HTTP ${status}: ${body.trim()}`));
            return;
          }
          try {
            resolve(body ? JSON.parse(body) : {});
          } catch {
            reject(new TransportError(`Failed to parse vfkit response: ${body.trim()}`));
          }
        });
      });

      req.on('timeout', () => {
        req.destroy(new TransportError(`vfkit ${method} ${path} timed out after ${this.timeoutMs}ms`));
      });

      req.on('error', (error) => {
        reject(error);
      });

      if (data !== undefined) {
        req.write(JSON.stringify(data));
      }
      req.end();
    });
  }
}
