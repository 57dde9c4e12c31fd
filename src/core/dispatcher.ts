/**
 * core/dispatcher.ts
 *
 * Runs the registered handler on a command value and maps its outcome to
 * a tools/call result. Handler failures are error-flagged results, never
 * protocol errors. Exactly one attempt per call.
 */

import { CallToolResult, CommandHandler } from './types';
import { errorMessage } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/dispatcher');

export const HANDLER_UNSET_MESSAGE =
  'No command handler provided. The CLI must provide a handler function to execute commands in MCP mode.';

export function textResult(text: string, isError: boolean): CallToolResult {
  return { content: [{ type: 'text', text }], isError };
}

export async function dispatch<T>(
  toolName: string,
  command: T,
  handler: CommandHandler<T> | undefined
): Promise<CallToolResult> {
  if (!handler) {
    log.warn({ tool: toolName }, 'Tool called with no handler registered');
    return textResult(HANDLER_UNSET_MESSAGE, true);
  }

  const start = Date.now();
  try {
    const outcome = await handler(command);
    const durationMs = Date.now() - start;
    if (outcome.ok) {
      log.info({ tool: toolName, durationMs }, 'Command succeeded');
      return textResult(outcome.output, false);
    }
    log.info({ tool: toolName, durationMs, error: outcome.error }, 'Command reported failure');
    return textResult(outcome.error, true);
  } catch (e) {
    log.error({ tool: toolName, error: errorMessage(e) }, 'Command handler threw');
    return textResult(errorMessage(e), true);
  }
}
