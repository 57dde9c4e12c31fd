/**
 * transports/stdio.ts
 *
 * JSON-RPC 2.0 over stdin/stdout. This is the transport used by MCP
 * clients that spawn the server as a child process and talk over pipes.
 *
 * Input is newline-delimited JSON (one complete JSON object per line).
 * One implicit session: it lasts until the input stream closes.
 */

import * as readline from 'readline';
import { McpProtocol, decodeMessage } from '../core/protocol';
import { OperationTracker } from '../core/operations';
import { JsonRpcResponse } from '../core/types';
import { errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('transports/stdio');

export interface StdioStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Serves one session. Resolves when the input closes and every call that
 * was already running has answered.
 */
export function startStdioTransport<T>(
  protocol: McpProtocol<T>,
  streams: StdioStreams = { input: process.stdin, output: process.stdout }
): Promise<void> {
  const operations = new OperationTracker();

  const send = (response: JsonRpcResponse): void => {
    streams.output.write(JSON.stringify(response) + '\n');
  };

  const handleLine = async (line: string): Promise<void> => {
    const trimmed = line.trim();
    if (!trimmed) return;

    const decoded = decodeMessage(trimmed);
    if ('response' in decoded) {
      send(decoded.response);
      return;
    }

    const response = await protocol.handle(decoded.message);
    if (response) send(response);
  };

  log.info('Stdio transport started, listening on stdin');

  const rl = readline.createInterface({ input: streams.input, terminal: false });

  rl.on('line', (line: string) => {
    operations.track(handleLine(line)).catch((e: unknown) => {
      log.error({ error: errorMessage(e) }, 'Critical error in stdio line handler');
    });
  });

  return new Promise<void>(resolve => {
    rl.once('close', () => {
      log.info({ inFlight: operations.size }, 'Stdin closed, finishing in-flight calls');
      void operations.drain().then(() => {
        log.info('Stdio session ended');
        resolve();
      });
    });
  });
}
