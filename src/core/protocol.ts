/**
 * core/protocol.ts
 *
 * JSON-RPC 2.0 / MCP method handling shared by every transport.
 *
 * Protocol:
 *   Client sends:  { "jsonrpc": "2.0", "id": N, "method": "tools/list" | "tools/call", "params": {...} }
 *   Server sends:  { "jsonrpc": "2.0", "id": N, "result": {...} }
 *                  or { "jsonrpc": "2.0", "id": N, "error": { "code": N, "message": "..." } }
 *
 * Notifications (no id) get no response. handle() never throws: every
 * failure becomes an error response.
 */

import { ToolRegistry } from './registry';
import {
  InitializeResult,
  JsonRpcError,
  JsonRpcId,
  JsonRpcResponse,
  ServerInfo
} from './types';
import {
  InvalidRequestError,
  McpBaseError,
  MethodNotFoundError,
  RPC_INTERNAL_ERROR,
  RPC_INVALID_PARAMS,
  RPC_PARSE_ERROR,
  errorMessage
} from './errors';
import { describeErrors, isCallToolParams, isJsonRpcRequest } from './schemas';
import { scopedLogger } from './logger';

const log = scopedLogger('core/protocol');

export const DEFAULT_PROTOCOL_VERSION = '2024-11-05';
export const SUPPORTED_PROTOCOL_VERSIONS = ['2025-03-26', '2024-11-05'];

export function successResponse(id: JsonRpcId | null, result: unknown): JsonRpcResponse {
  return { jsonrpc: '2.0', id, result };
}

export function errorResponse(id: JsonRpcId | null, error: JsonRpcError): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error };
}

/** Decodes one raw message. Malformed JSON becomes a ready-made -32700 response. */
export function decodeMessage(raw: string): { message: unknown } | { response: JsonRpcResponse } {
  try {
    const message: unknown = JSON.parse(raw);
    return { message };
  } catch (e) {
    log.warn({ error: errorMessage(e) }, 'Failed to parse JSON-RPC message');
    return { response: errorResponse(null, { code: RPC_PARSE_ERROR, message: 'Parse error' }) };
  }
}

function toRpcError(e: unknown): JsonRpcError {
  if (e instanceof McpBaseError) {
    return { code: e.rpcCode, message: e.message, data: { errorCode: e.code } };
  }
  return { code: RPC_INTERNAL_ERROR, message: errorMessage(e) };
}

export class McpProtocol<T> {
  constructor(
    private readonly registry: ToolRegistry<T>,
    private readonly serverInfo: ServerInfo
  ) {}

  get tools(): ToolRegistry<T> {
    return this.registry;
  }

  async handle(message: unknown): Promise<JsonRpcResponse | undefined> {
    if (!isJsonRpcRequest(message)) {
      log.warn({ violations: describeErrors(isJsonRpcRequest.errors, 'message') }, 'Rejected malformed JSON-RPC message');
      return errorResponse(null, toRpcError(new InvalidRequestError('Invalid Request')));
    }

    const { id, method, params } = message;
    if (id === undefined) {
      log.debug({ method }, 'Notification received');
      return undefined;
    }

    try {
      return successResponse(id, await this.route(method, params ?? {}));
    } catch (e) {
      const level = e instanceof McpBaseError ? 'warn' : 'error';
      log[level]({ method, error: errorMessage(e) }, 'Request failed');
      return errorResponse(id, toRpcError(e));
    }
  }

  private async route(method: string, params: Record<string, unknown>): Promise<unknown> {
    switch (method) {
      // ---------------------------------------------------------------
      // initialize - MCP protocol handshake
      // ---------------------------------------------------------------
      case 'initialize': {
        return this.initialize(params);
      }

      case 'ping': {
        return {};
      }

      case 'tools/list': {
        return { tools: this.registry.list() };
      }

      case 'tools/call': {
        if (!isCallToolParams(params)) {
          throw new InvalidRequestError(
            `Invalid tools/call params: ${describeErrors(isCallToolParams.errors, 'params')}`,
            RPC_INVALID_PARAMS
          );
        }
        return this.registry.invoke({ toolName: params.name, arguments: params.arguments ?? {} });
      }

      default:
        throw new MethodNotFoundError(method);
    }
  }

  private initialize(params: Record<string, unknown>): InitializeResult {
    const requested = params.protocolVersion;
    const protocolVersion =
      typeof requested === 'string' && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
        ? requested
        : DEFAULT_PROTOCOL_VERSION;

    log.info({ protocolVersion, clientInfo: params.clientInfo }, 'Client initialized');
    return {
      protocolVersion,
      capabilities: { tools: {} },
      serverInfo: this.serverInfo
    };
  }
}
