/**
 * core/registry.ts
 *
 * The one handle every session shares. Responsibilities:
 *   - Exposes list() for tools/list responses.
 *   - Resolves a tool name to its descriptor.
 *   - Marshals invocations back through the command schema and dispatches
 *     the resulting command to the handler.
 *
 * Built once per server and never mutated afterwards, so concurrent
 * sessions need no coordination to use it.
 */

import { CommandSchemaAdapter } from '../schema/types';
import { CallToolResult, CommandHandler, InvocationRequest, ToolDescriptor } from './types';
import { UnknownToolError } from './errors';
import { extractToolDescriptors } from './extractor';
import { marshalInvocation } from './marshaller';
import { dispatch } from './dispatcher';
import { scopedLogger } from './logger';

const log = scopedLogger('core/registry');

export class ToolRegistry<T> {
  constructor(
    private readonly schema: CommandSchemaAdapter<T>,
    private readonly handler?: CommandHandler<T>
  ) {}

  get hasHandler(): boolean {
    return this.handler !== undefined;
  }

  // -----------------------------------------------------------------------
  // Listing (for tools/list)
  // -----------------------------------------------------------------------

  list(): ToolDescriptor[] {
    return extractToolDescriptors(this.schema);
  }

  // -----------------------------------------------------------------------
  // Resolution
  // -----------------------------------------------------------------------

  /**
   * Look up the descriptor for a tool name.
   * Throws UnknownToolError if no visible subcommand carries it.
   */
  resolve(toolName: string): ToolDescriptor {
    const descriptor = this.list().find(t => t.name === toolName);
    if (!descriptor) throw new UnknownToolError(toolName);
    return descriptor;
  }

  // -----------------------------------------------------------------------
  // Dispatch
  // -----------------------------------------------------------------------

  /**
   * Flow:
   *   1. Resolve the descriptor (positional metadata)
   *   2. Marshal arguments to tokens, parse and convert
   *   3. Hand the command value to the handler
   *
   * Marshalling failures throw; handler failures come back as results.
   */
  async invoke(request: InvocationRequest): Promise<CallToolResult> {
    const descriptor = this.resolve(request.toolName);
    log.info({ tool: request.toolName, argCount: Object.keys(request.arguments).length }, 'Dispatching tool invocation');

    const command = marshalInvocation(this.schema, request.toolName, descriptor, request.arguments);
    return dispatch(request.toolName, command, this.handler);
  }
}
