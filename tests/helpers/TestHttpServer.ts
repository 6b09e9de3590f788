import type { Express } from 'express';
import { request as httpRequest, type Server } from 'http';

export interface TestResponse {
  status: number;
  body: unknown;
}

export interface RequestOptions {
  /** Serialized as JSON unless `rawBody` is given. */
  json?: unknown;
  /** Sent as-is with a JSON content type. */
  rawBody?: string;
}

/**
 * TestHttpServer
 * Mounts an Express app on an ephemeral loopback port for the duration of a
 * test file and issues plain HTTP requests against it.
 */
export class TestHttpServer {
  private app: Express;
  private server: Server | null = null;
  private port = 0;

  constructor(app: Express) {
    this.app = app;
  }

  async start(): Promise<void> {
    this.server = await new Promise<Server>((resolve, reject) => {
      const server = this.app.listen(0, '127.0.0.1', () => resolve(server));
      server.once('error', reject);
    });

    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Test server is not listening on a TCP port');
    }
    this.port = address.port;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  get(path: string): Promise<TestResponse> {
    return this.request('GET', path);
  }

  post(path: string, options: RequestOptions): Promise<TestResponse> {
    return this.request('POST', path, options);
  }

  put(path: string, options: RequestOptions): Promise<TestResponse> {
    return this.request('PUT', path, options);
  }

  delete(path: string): Promise<TestResponse> {
    return this.request('DELETE', path);
  }

  request(method: string, path: string, options: RequestOptions = {}): Promise<TestResponse> {
    const payload =
      options.rawBody ?? (options.json !== undefined ? JSON.stringify(options.json) : undefined);

    return new Promise<TestResponse>((resolve, reject) => {
      const req = httpRequest(
        {
          host: '127.0.0.1',
          port: this.port,
          method,
          path,
          agent: false,
          headers:
            payload !== undefined
              ? {
                  'content-type': 'application/json',
                  'content-length': Buffer.byteLength(payload),
                }
              : {},
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on('data', (chunk: Buffer) => chunks.push(chunk));
          res.on('end', () => {
            const text = Buffer.concat(chunks).toString('utf-8');
            try {
              resolve({ status: res.statusCode ?? 0, body: text ? JSON.parse(text) : null });
            } catch (error) {
              reject(new Error(`Response was not JSON: ${text}`, { cause: error }));
            }
          });
          res.on('error', reject);
        }
      );

      req.on('error', reject);
      if (payload !== undefined) {
        req.write(payload);
      }
      req.end();
    });
  }
}
