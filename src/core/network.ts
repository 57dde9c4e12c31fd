/**
 * core/network.ts
 *
 * The long-running network server: one express app carrying the SSE
 * session transport and the streamless HTTP transport.
 *
 * Lifecycle:  starting → listening → (serving)* → draining → stopped
 *
 * "serving" is reported while sessions are open or calls are in flight.
 * Draining refuses new sessions, lets running calls answer, then ends the
 * open streams and closes the listener.
 */

import * as http from 'http';
import express, { NextFunction, Request, Response } from 'express';
import { McpProtocol, errorResponse } from './protocol';
import { OperationTracker } from './operations';
import { BindAddress } from './types';
import { RPC_PARSE_ERROR, TransportError } from './errors';
import { waitForAbort } from './signals';
import { SseTransport, SSE_PATH, MESSAGE_PATH } from '../transports/sse';
import { createHttpTransport, HTTP_PATH } from '../transports/http';
import { scopedLogger } from './logger';

const log = scopedLogger('core/network');

export type LifecycleState = 'starting' | 'listening' | 'serving' | 'draining' | 'stopped';

export interface NetworkServerOptions {
  /** Where the listening endpoints are announced. Defaults to stdout. */
  print?: (line: string) => void;
}

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export class NetworkServer<T> {
  private phase: Exclude<LifecycleState, 'serving'> = 'starting';
  private readonly operations = new OperationTracker();
  private readonly sse: SseTransport<T>;
  private readonly app: express.Application;
  private readonly print: (line: string) => void;
  private server?: http.Server;
  private boundAddress?: BindAddress;
  private closing?: Promise<void>;

  constructor(private readonly protocol: McpProtocol<T>, options: NetworkServerOptions = {}) {
    this.print = options.print ?? (line => process.stdout.write(`${line}\n`));
    this.sse = new SseTransport(protocol, this.operations);
    this.app = this.createApp();
  }

  get state(): LifecycleState {
    if (this.phase === 'listening' && (this.sse.sessionCount > 0 || this.operations.size > 0)) {
      return 'serving';
    }
    return this.phase;
  }

  /** The bound address; the real port when 0 was requested. */
  get address(): BindAddress | undefined {
    return this.boundAddress;
  }

  get url(): string | undefined {
    return this.boundAddress ? `http://${this.boundAddress.host}:${this.boundAddress.port}` : undefined;
  }

  private createApp(): express.Application {
    const app = express();
    app.use(express.json());

    app.use(this.sse.router);
    app.use(createHttpTransport(this.protocol, this.operations, () => this.phase === 'listening'));

    // -----------------------------------------------------------------------
    // GET /health
    // -----------------------------------------------------------------------
    app.get('/health', (_req: Request, res: Response) => {
      res.json({
        status: 'ok',
        state: this.state,
        sessions: this.sse.sessionCount,
        tools: this.protocol.tools.list().length
      });
    });

    // -----------------------------------------------------------------------
    // Error handler (Error boundary for unhandled errors)
    // -----------------------------------------------------------------------
    app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
      if (res.headersSent) return;

      if (isBodyParseError(err)) {
        log.warn({ path: req.path, error: err.message }, 'Malformed JSON body');
        res.status(400).json(errorResponse(null, { code: RPC_PARSE_ERROR, message: 'Parse error' }));
        return;
      }

      log.error({ error: err.message, stack: err.stack, path: req.path, method: req.method }, 'Unhandled error in network transport');
      res.status(500).json({ error: 'Internal server error', message: err.message });
    });

    return app;
  }

  /** Binds the listener and announces the endpoints. */
  listen(address: BindAddress): Promise<BindAddress> {
    if (this.phase !== 'starting') {
      return Promise.reject(new TransportError(`Cannot listen while ${this.phase}`));
    }

    return new Promise<BindAddress>((resolve, reject) => {
      const server = this.app.listen(address.port, address.host);

      const onError = (err: Error): void => {
        this.phase = 'stopped';
        log.error({ ...address, error: err.message }, 'Failed to bind');
        reject(new TransportError(`Failed to bind ${address.host}:${address.port}: ${err.message}`, { ...address }));
      };
      server.once('error', onError);

      server.once('listening', () => {
        server.off('error', onError);
        server.on('error', (err: Error) => {
          log.error({ error: err.message }, 'Listener error');
        });

        const info = server.address();
        const port = info !== null && typeof info === 'object' ? info.port : address.port;
        this.server = server;
        this.boundAddress = { host: address.host, port };
        this.phase = 'listening';

        const base = `http://${address.host}:${port}`;
        log.info({ host: address.host, port }, 'Network server listening');
        this.print(`MCP server listening on ${base}`);
        this.print(`SSE endpoint: ${base}${SSE_PATH}`);
        this.print(`Message endpoint: ${base}${MESSAGE_PATH}`);
        this.print(`HTTP endpoint: ${base}${HTTP_PATH}`);
        resolve(this.boundAddress);
      });
    });
  }

  /** Orderly shutdown. Safe to call more than once. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  /** Listens, serves until the signal aborts, then shuts down. */
  async run(address: BindAddress, signal: AbortSignal): Promise<void> {
    await this.listen(address);
    await waitForAbort(signal);
    await this.close();
  }

  private async shutdown(): Promise<void> {
    const server = this.server;
    if (!server) {
      this.phase = 'stopped';
      return;
    }

    this.phase = 'draining';
    this.sse.stopAccepting();
    log.info({ sessions: this.sse.sessionCount, inFlight: this.operations.size }, 'Draining network server');

    const closed = new Promise<Error | undefined>(resolve => {
      server.close(err => resolve(err));
    });

    await this.operations.drain();
    await this.sse.closeAll();
    server.closeAllConnections();

    const err = await closed;
    this.phase = 'stopped';
    if (err) {
      log.error({ error: err.message }, 'Failed to close listener');
      throw new TransportError(`Failed to close listener: ${err.message}`);
    }
    log.info('Network server stopped');
  }
}
