/**
 * transports/sse.ts
 *
 * MCP over Server-Sent Events. One SSE stream per session; the client
 * posts JSON-RPC messages to the endpoint announced on that stream and
 * reads the responses back from it.
 *
 * Routes:
 *   GET  /sse                       → Opens a session; first event is "endpoint"
 *   POST /message?sessionId=<id>    → Submits one message; 202, answer pushed via SSE
 */

import { randomUUID } from 'crypto';
import express, { Request, Response } from 'express';
import { McpProtocol } from '../core/protocol';
import { OperationTracker } from '../core/operations';
import { errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { whenFinished } from './http';

const log = scopedLogger('transports/sse');

export const SSE_PATH = '/sse';
export const MESSAGE_PATH = '/message';

function pushEvent(res: Response, event: string, data: string): void {
  // SSE format: each message is "event: …\ndata: …\n\n"
  res.write(`event: ${event}\n`);
  res.write(`data: ${data}\n\n`);
}

export class SseTransport<T> {
  readonly router = express.Router();

  /** Active SSE streams: sessionId → Response object */
  private readonly sessions = new Map<string, Response>();
  private accepting = true;

  constructor(
    private readonly protocol: McpProtocol<T>,
    private readonly operations: OperationTracker
  ) {
    this.router.get(SSE_PATH, (req, res) => this.connect(req, res));
    this.router.post(MESSAGE_PATH, (req, res) => this.receive(req, res));
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /** Refuses new sessions; open ones keep working. */
  stopAccepting(): void {
    this.accepting = false;
  }

  /** Ends every open stream; resolves once their last events are flushed. */
  async closeAll(): Promise<void> {
    const streams = Array.from(this.sessions.entries());
    this.sessions.clear();
    for (const [sessionId, res] of streams) {
      res.end();
      log.info({ sessionId }, 'SSE session closed by server');
    }
    await Promise.all(streams.map(([, res]) => whenFinished(res)));
  }

  // -----------------------------------------------------------------------
  // GET /sse: establish SSE stream
  // -----------------------------------------------------------------------
  private connect(_req: Request, res: Response): void {
    if (!this.accepting) {
      res.status(503).json({ error: 'Server is shutting down' });
      return;
    }

    const sessionId = randomUUID();

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // nginx passthrough
    res.flushHeaders();

    // Tell the client where to post its messages
    pushEvent(res, 'endpoint', `${MESSAGE_PATH}?sessionId=${sessionId}`);

    this.sessions.set(sessionId, res);
    log.info({ sessionId }, 'SSE client connected');

    res.on('close', () => {
      this.sessions.delete(sessionId);
      log.info({ sessionId }, 'SSE client disconnected');
    });
  }

  // -----------------------------------------------------------------------
  // POST /message: submit a message, answer pushed via SSE
  // -----------------------------------------------------------------------
  private receive(req: Request, res: Response): void {
    const sessionId = req.query.sessionId;
    const stream = typeof sessionId === 'string' ? this.sessions.get(sessionId) : undefined;
    if (!stream) {
      res.status(404).json({ error: `No active SSE session "${String(sessionId)}"` });
      return;
    }

    // Acknowledge receipt immediately
    res.status(202).send('Accepted');

    const message: unknown = req.body;
    this.operations
      .track(this.deliver(stream, message))
      .catch((e: unknown) => {
        log.error({ sessionId, error: errorMessage(e) }, 'Failed to deliver SSE response');
      });
  }

  private async deliver(stream: Response, message: unknown): Promise<void> {
    const response = await this.protocol.handle(message);
    if (!response) return;

    if (stream.writableEnded) {
      log.warn({ id: response.id }, 'Session closed before the response was ready');
      return;
    }
    pushEvent(stream, 'message', JSON.stringify(response));
  }
}
