/**
 * transports/http.ts
 *
 * Streamless HTTP transport. Each request is one JSON-RPC message:
 * receive → dispatch → respond in the body.
 *
 * Routes:
 *   POST /mcp    → JSON-RPC response, or 202 for a notification
 */

import express, { Request, Response } from 'express';
import { McpProtocol } from '../core/protocol';
import { OperationTracker } from '../core/operations';
import { errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('transports/http');

export const HTTP_PATH = '/mcp';

/** Resolves once the response has been handed to the socket or the connection is gone. */
export function whenFinished(res: Response): Promise<void> {
  if (res.writableFinished || res.destroyed) return Promise.resolve();
  return new Promise<void>(resolve => {
    res.once('finish', () => resolve());
    res.once('close', () => resolve());
  });
}

export function createHttpTransport<T>(
  protocol: McpProtocol<T>,
  operations: OperationTracker,
  isAccepting: () => boolean
): express.Router {
  const router = express.Router();

  const respond = async (message: unknown, res: Response): Promise<void> => {
    // Error boundary: catch all errors to prevent server crash
    try {
      const response = await protocol.handle(message);
      if (!response) {
        res.status(202).end();
      } else {
        res.json(response);
      }
    } catch (e) {
      log.error({ error: errorMessage(e) }, 'HTTP message handling failed');
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error', message: errorMessage(e) });
      }
    }
    await whenFinished(res);
  };

  router.post(HTTP_PATH, (req: Request, res: Response) => {
    if (!isAccepting()) {
      res.status(503).json({ error: 'Server is shutting down' });
      return;
    }

    const message: unknown = req.body;
    operations.track(respond(message, res)).catch((e: unknown) => {
      log.error({ error: errorMessage(e) }, 'Failed to send HTTP response');
    });
  });

  return router;
}
