/**
 * mode.ts
 *
 * Lets a host CLI double as an MCP server:
 *
 *   addMcpOptions(program);
 *   if (!(await runMcpMode(program, server))) program.parse();
 *
 * `--mcp` alone serves over stdio; `--mcp-port` switches to HTTP.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { McpServer } from './core/server';
import { McpTransport } from './core/types';
import { loadEnvironment, loadServerConfig, parsePort } from './core/config';
import { errorMessage } from './core/errors';
import { initLogger, scopedLogger } from './core/logger';

const log = scopedLogger('mode');

interface McpFlags {
  mcp?: boolean;
  mcpPort?: number;
  mcpHost?: string;
}

function portArgument(value: string): number {
  try {
    return parsePort(value);
  } catch (e) {
    throw new InvalidArgumentError(errorMessage(e));
  }
}

export function addMcpOptions(program: Command): Command {
  return program
    .addOption(new Option('--mcp', 'run as an MCP server instead of executing a command'))
    .addOption(new Option('--mcp-port <port>', 'serve MCP over HTTP on this port').argParser(portArgument))
    .addOption(new Option('--mcp-host <host>', 'address to bind the MCP HTTP server to'));
}

export interface McpModeOptions {
  /** User arguments, without the node and script entries. */
  argv?: readonly string[];
  signal?: AbortSignal;
  /** `.env` file to load before reading the environment. */
  envPath?: string;
}

/**
 * Serves MCP when `--mcp` is among the arguments and resolves `true` once
 * the server has stopped. Resolves `false` otherwise, leaving the host to
 * run its normal command path.
 */
export async function runMcpMode<T>(
  program: Command,
  server: McpServer<T>,
  options: McpModeOptions = {}
): Promise<boolean> {
  program.parseOptions([...(options.argv ?? process.argv.slice(2))]);
  const flags = program.opts<McpFlags>();
  if (!flags.mcp) return false;

  loadEnvironment(options.envPath);
  const config = loadServerConfig({
    transportMode: flags.mcpPort !== undefined ? 'http' : undefined,
    port: flags.mcpPort,
    host: flags.mcpHost
  });
  initLogger(config);

  const transport: McpTransport =
    config.transportMode === 'http'
      ? { mode: 'http', address: { host: config.host, port: config.port } }
      : { mode: 'stdio' };

  log.info({ transport: transport.mode }, 'MCP mode requested');
  await server.serve(transport, options.signal);
  return true;
}
