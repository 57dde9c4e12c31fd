/**
 * Public entry point. Exposes a commander command tree as MCP tools.
 */

export { McpServer, McpServerOptions, DEFAULT_SERVER_NAME, DEFAULT_SERVER_VERSION } from './core/server';
export { NetworkServer, NetworkServerOptions, LifecycleState } from './core/network';
export { McpProtocol, DEFAULT_PROTOCOL_VERSION, SUPPORTED_PROTOCOL_VERSIONS } from './core/protocol';
export { ToolRegistry } from './core/registry';
export { extractToolDescriptors, describeSubcommand } from './core/extractor';
export { buildTokens, marshalInvocation } from './core/marshaller';
export { dispatch, HANDLER_UNSET_MESSAGE } from './core/dispatcher';
export { loadEnvironment, loadServerConfig, parsePort, DEFAULT_CONFIG } from './core/config';
export { initLogger, scopedLogger } from './core/logger';
export { shutdownSignal } from './core/signals';
export * from './core/errors';
export * from './core/types';

export { CommanderSchema, CommanderSchemaOptions } from './schema/commander';
export { createAjvConverter } from './schema/converter';
export * from './schema/types';

export { addMcpOptions, runMcpMode, McpModeOptions } from './mode';
export { StdioStreams } from './transports/stdio';
export { McpSseClient, McpRemoteError } from './testing/client';
