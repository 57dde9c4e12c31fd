/**
 * core/config.ts
 *
 * Server configuration. Each field is taken from the first source that
 * sets it:
 *
 *   CLI overrides  ›  environment (MCP_*)  ›  config/server.json  ›  defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import Ajv from 'ajv';
import { LogLevel, ServerConfig, TransportMode } from './types';
import { ConfigError, errorMessage } from './errors';
import { describeErrors } from './schemas';

export const DEFAULT_CONFIG: ServerConfig = {
  transportMode: 'stdio',
  host: '127.0.0.1',
  port: 8080,
  logLevel: 'info'
};

export const DEFAULT_CONFIG_PATH = path.join('config', 'server.json');

const TRANSPORT_MODES: readonly TransportMode[] = ['stdio', 'http'];
const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

const ajv = new Ajv({ allErrors: true });

const isConfigFile = ajv.compile<Partial<ServerConfig>>({
  type: 'object',
  properties: {
    transportMode: { type: 'string', enum: [...TRANSPORT_MODES] },
    host: { type: 'string', minLength: 1 },
    port: { type: 'integer', minimum: 0, maximum: 65535 },
    logLevel: { type: 'string', enum: [...LOG_LEVELS] }
  },
  additionalProperties: false
});

/** Loads `.env` from the working directory into process.env. */
export function loadEnvironment(envPath?: string): void {
  dotenv.config(envPath ? { path: envPath } : undefined);
}

export function parsePort(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isInteger(n) || n < 0 || n > 65535) {
    throw new ConfigError(`Invalid port: ${value}`, { value });
  }
  return n;
}

function parseTransportMode(value: string): TransportMode {
  const mode = TRANSPORT_MODES.find(m => m === value);
  if (!mode) throw new ConfigError(`Invalid transport mode: ${value}`, { value, allowed: TRANSPORT_MODES });
  return mode;
}

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find(l => l === value);
  if (!level) throw new ConfigError(`Invalid log level: ${value}`, { value, allowed: LOG_LEVELS });
  return level;
}

function readConfigFile(configPath: string, required: boolean): Partial<ServerConfig> {
  if (!fs.existsSync(configPath)) {
    if (required) throw new ConfigError(`Config file not found: ${configPath}`, { configPath });
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Malformed config file ${configPath}: ${errorMessage(e)}`, { configPath });
  }

  if (!isConfigFile(parsed)) {
    throw new ConfigError(
      `Invalid config file ${configPath}: ${describeErrors(isConfigFile.errors, 'config')}`,
      { configPath }
    );
  }
  return parsed;
}

function readEnvironment(env: NodeJS.ProcessEnv): Partial<ServerConfig> {
  const fromEnv: Partial<ServerConfig> = {};
  if (env.MCP_TRANSPORT) fromEnv.transportMode = parseTransportMode(env.MCP_TRANSPORT);
  if (env.MCP_HOST) fromEnv.host = env.MCP_HOST;
  if (env.MCP_PORT) fromEnv.port = parsePort(env.MCP_PORT);
  if (env.MCP_LOG_LEVEL) fromEnv.logLevel = parseLogLevel(env.MCP_LOG_LEVEL);
  return fromEnv;
}

export interface ConfigSources {
  env?: NodeJS.ProcessEnv;
  /** Resolved against the working directory. Overrides MCP_CONFIG. */
  configPath?: string;
}

export function loadServerConfig(
  overrides: Partial<ServerConfig> = {},
  sources: ConfigSources = {}
): ServerConfig {
  const env = sources.env ?? process.env;
  const explicitPath = sources.configPath ?? env.MCP_CONFIG;
  const configPath = path.resolve(process.cwd(), explicitPath ?? DEFAULT_CONFIG_PATH);

  const file = readConfigFile(configPath, explicitPath !== undefined);
  const fromEnv = readEnvironment(env);

  return {
    transportMode: overrides.transportMode ?? fromEnv.transportMode ?? file.transportMode ?? DEFAULT_CONFIG.transportMode,
    host: overrides.host ?? fromEnv.host ?? file.host ?? DEFAULT_CONFIG.host,
    port: overrides.port ?? fromEnv.port ?? file.port ?? DEFAULT_CONFIG.port,
    logLevel: overrides.logLevel ?? fromEnv.logLevel ?? file.logLevel ?? DEFAULT_CONFIG.logLevel
  };
}
