/**
 * core/types.ts
 *
 * Single source of truth for every shared type in the project.
 * All modules import from here. Nothing defines its own DTOs.
 */

// ---------------------------------------------------------------------------
// Tool descriptors (what we expose in tools/list)
// ---------------------------------------------------------------------------

export type PropertyType = 'boolean' | 'string';

/**
 * One property of a tool's input schema. The `x-` keys are descriptor
 * extensions read back by the marshaller; generic MCP clients ignore them.
 */
export interface PropertyShape {
  type: PropertyType;
  description?: string;
  'x-positional'?: boolean;
  'x-position'?: number;
  'x-flag'?: string;                       // only when the token is not `--<name>`
}

export interface InputShape {
  type: 'object';
  properties: Record<string, PropertyShape>;
  required: string[];
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: InputShape;
}

// ---------------------------------------------------------------------------
// Invocation & results
// ---------------------------------------------------------------------------

export interface InvocationRequest {
  toolName: string;
  arguments: Record<string, unknown>;
}

export interface TextContent {
  type: 'text';
  text: string;
}

export interface CallToolResult {
  content: TextContent[];
  isError?: boolean;
}

/** What a command handler returns: the text output or a failure message. */
export type CommandOutcome =
  | { ok: true; output: string }
  | { ok: false; error: string };

export type CommandHandler<T> = (command: T) => CommandOutcome | Promise<CommandOutcome>;

export function ok(output: string): CommandOutcome {
  return { ok: true, output };
}

export function fail(error: string): CommandOutcome {
  return { ok: false, error };
}

// ---------------------------------------------------------------------------
// JSON-RPC 2.0
// ---------------------------------------------------------------------------

export type JsonRpcId = string | number;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: JsonRpcId;                          // absent on notifications
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  result?: unknown;
  error?: JsonRpcError;
}

export interface CallToolParams {
  name: string;
  arguments?: Record<string, unknown>;
}

export interface ServerInfo {
  name: string;
  version: string;
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities: { tools: Record<string, never> };
  serverInfo: ServerInfo;
}

export interface ListToolsResult {
  tools: ToolDescriptor[];
}

// ---------------------------------------------------------------------------
// Server configuration & transport
// ---------------------------------------------------------------------------

export type TransportMode = 'stdio' | 'http';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface BindAddress {
  host: string;
  port: number;
}

export type McpTransport =
  | { mode: 'stdio' }
  | { mode: 'http'; address: BindAddress };

export interface ServerConfig {
  transportMode: TransportMode;
  host: string;                            // HTTP only
  port: number;                            // HTTP only
  logLevel: LogLevel;
}
