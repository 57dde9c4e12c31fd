/**
 * core/errors.ts
 *
 * Typed error hierarchy. Every throw site uses one of these.
 * `code` is the stable string identifier that shows up in logs and in the
 * JSON-RPC error's `data.errorCode`; `rpcCode` is the JSON-RPC error code
 * the protocol layer answers with.
 */

export const RPC_PARSE_ERROR = -32700;
export const RPC_INVALID_REQUEST = -32600;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INVALID_PARAMS = -32602;
export const RPC_INTERNAL_ERROR = -32603;
export const RPC_SERVER_ERROR = -32000;

export class McpBaseError extends Error {
  readonly code: string;
  readonly rpcCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>, rpcCode = RPC_SERVER_ERROR) {
    super(message);
    this.code = code;
    this.rpcCode = rpcCode;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // fix instanceof in TS
  }
}

// ---------------------------------------------------------------------------
// Marshalling errors
// ---------------------------------------------------------------------------

/** The reconstructed token sequence does not satisfy the command schema. */
export class InvalidArgumentsError extends McpBaseError {
  constructor(toolName: string, parserMessage: string) {
    super(
      `Invalid arguments: ${parserMessage}`,
      'INVALID_ARGUMENTS',
      { toolName, parserMessage },
      RPC_INVALID_PARAMS
    );
  }
}

/** Tokens matched a subcommand but the values could not be turned into a command. */
export class SubcommandConversionError extends McpBaseError {
  constructor(toolName: string, converterMessage: string) {
    super(
      `Failed to parse subcommand: ${converterMessage}`,
      'SUBCOMMAND_CONVERSION_FAILED',
      { toolName, converterMessage },
      RPC_INVALID_PARAMS
    );
  }
}

// ---------------------------------------------------------------------------
// Protocol errors
// ---------------------------------------------------------------------------

/** The client requested a tool name that no subcommand carries. */
export class UnknownToolError extends McpBaseError {
  constructor(toolName: string) {
    super(`Unknown tool: "${toolName}"`, 'UNKNOWN_TOOL', { toolName }, RPC_INVALID_PARAMS);
  }
}

/** The message or its params do not have the shape the method requires. */
export class InvalidRequestError extends McpBaseError {
  constructor(message: string, rpcCode = RPC_INVALID_REQUEST) {
    super(message, 'INVALID_REQUEST', undefined, rpcCode);
  }
}

export class MethodNotFoundError extends McpBaseError {
  constructor(method: string) {
    super(`Unknown method: "${method}"`, 'METHOD_NOT_FOUND', { method }, RPC_METHOD_NOT_FOUND);
  }
}

// ---------------------------------------------------------------------------
// Configuration & transport errors
// ---------------------------------------------------------------------------

export class ConfigError extends McpBaseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

/** Bind failures and broken sessions. Fatal to that listener or session only. */
export class TransportError extends McpBaseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', details);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
