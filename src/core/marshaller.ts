/**
 * core/marshaller.ts
 *
 * Rebuilds the command line a person would have typed for a tools/call,
 * then hands it back to the command schema to parse and convert.
 *
 * Token layout:  <program> <tool> <positionals by x-position> <named args>
 *
 * Named arguments go out in mapping iteration order. That is only sound
 * because the parser does not care about the order of named arguments.
 */

import { CommandSchemaAdapter, PROGRAM_NAME } from '../schema/types';
import { ToolDescriptor } from './types';
import { InvalidArgumentsError, SubcommandConversionError } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/marshaller');

interface PositionalEntry {
  value: unknown;
  position: number;
}

/** Text form of a positional value or of a named argument's value. */
export function valueToText(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
      return String(value);
    default:
      return JSON.stringify(value);
  }
}

export function buildTokens(
  toolName: string,
  descriptor: ToolDescriptor | undefined,
  args: Record<string, unknown>
): string[] {
  const tokens = [PROGRAM_NAME, toolName];
  const positional: PositionalEntry[] = [];
  const named: Array<[string, unknown]> = [];
  const properties = descriptor?.inputSchema.properties ?? {};

  for (const [key, value] of Object.entries(args)) {
    const shape = properties[key];
    if (shape?.['x-positional'] === true) {
      positional.push({ value, position: shape['x-position'] ?? positional.length });
    } else {
      named.push([key, value]);
    }
  }

  // Array#sort is stable: equal positions keep mapping order.
  positional.sort((a, b) => a.position - b.position);
  for (const entry of positional) {
    tokens.push(valueToText(entry.value));
  }

  for (const [key, value] of named) {
    const flag = properties[key]?.['x-flag'] ?? `--${key}`;
    if (typeof value === 'boolean') {
      // An absent flag already means false.
      if (value) tokens.push(flag);
      continue;
    }
    tokens.push(flag, valueToText(value));
  }

  return tokens;
}

/** Parses a full token sequence and converts the match into a command value. */
export function parseTokens<T>(schema: CommandSchemaAdapter<T>, toolName: string, tokens: readonly string[]): T {
  const parsed = schema.tryParse(tokens);
  if (!parsed.matched) {
    throw new InvalidArgumentsError(toolName, parsed.message);
  }

  const converted = schema.convert(parsed.matches);
  if (!converted.converted) {
    throw new SubcommandConversionError(toolName, converted.message);
  }
  return converted.value;
}

export function marshalInvocation<T>(
  schema: CommandSchemaAdapter<T>,
  toolName: string,
  descriptor: ToolDescriptor | undefined,
  args: Record<string, unknown>
): T {
  const tokens = buildTokens(toolName, descriptor, args);
  log.debug({ tool: toolName, tokens }, 'Marshalled tool arguments');
  return parseTokens(schema, toolName, tokens);
}
