/**
 * core/server.ts
 *
 * The embedding entry point. Wraps a command schema and an optional
 * handler, builds the shared registry and protocol once, and serves them
 * over the selected transport:
 *
 *   const server = new McpServer(schema).withHandler(run);
 *   await server.serve({ mode: 'stdio' });
 */

import { CommandSchemaAdapter } from '../schema/types';
import { BindAddress, CommandHandler, McpTransport, ServerInfo } from './types';
import { ToolRegistry } from './registry';
import { McpProtocol } from './protocol';
import { NetworkServer } from './network';
import { shutdownSignal } from './signals';
import { StdioStreams, startStdioTransport } from '../transports/stdio';
import { scopedLogger } from './logger';

const log = scopedLogger('core/server');

export const DEFAULT_SERVER_NAME = 'commander-mcp';
export const DEFAULT_SERVER_VERSION = '0.1.0';

export interface McpServerOptions<T> {
  handler?: CommandHandler<T>;
  name?: string;
  version?: string;
  /** Where the network server announces its endpoints. */
  print?: (line: string) => void;
}

export class McpServer<T> {
  private readonly protocol: McpProtocol<T>;

  constructor(
    private readonly schema: CommandSchemaAdapter<T>,
    private readonly options: McpServerOptions<T> = {}
  ) {
    const registry = new ToolRegistry(schema, options.handler);
    const serverInfo: ServerInfo = {
      name: options.name ?? DEFAULT_SERVER_NAME,
      version: options.version ?? DEFAULT_SERVER_VERSION
    };
    this.protocol = new McpProtocol(registry, serverInfo);
  }

  /** Returns a new server that runs commands through `handler`. */
  withHandler(handler: CommandHandler<T>): McpServer<T> {
    return new McpServer(this.schema, { ...this.options, handler });
  }

  get registry(): ToolRegistry<T> {
    return this.protocol.tools;
  }

  get mcpProtocol(): McpProtocol<T> {
    return this.protocol;
  }

  // -----------------------------------------------------------------------
  // Transports
  // -----------------------------------------------------------------------

  serve(transport: McpTransport, signal?: AbortSignal): Promise<void> {
    switch (transport.mode) {
      case 'stdio':
        return this.serveStdio();
      case 'http':
        return this.serveHttp(transport.address, signal);
    }
  }

  serveStdio(streams?: StdioStreams): Promise<void> {
    this.logStart('stdio');
    return startStdioTransport(this.protocol, streams);
  }

  /**
   * Serves until `signal` aborts. Without a signal, SIGINT and SIGTERM
   * start the shutdown.
   */
  async serveHttp(address: BindAddress, signal?: AbortSignal): Promise<void> {
    this.logStart('http', address);
    const network = this.createNetworkServer();

    if (signal) {
      await network.run(address, signal);
      return;
    }

    const interrupts = shutdownSignal();
    try {
      await network.run(address, interrupts.signal);
    } finally {
      interrupts.dispose();
    }
  }

  /** A network server the caller drives with listen() and close(). */
  createNetworkServer(): NetworkServer<T> {
    return new NetworkServer(this.protocol, { print: this.options.print });
  }

  private logStart(transport: McpTransport['mode'], address?: BindAddress): void {
    log.info(
      {
        transport,
        ...address,
        tools: this.protocol.tools.list().length,
        handler: this.protocol.tools.hasHandler
      },
      'MCP server starting'
    );
  }
}
