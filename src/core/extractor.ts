/**
 * core/extractor.ts
 *
 * Walks the command schema and produces one tool descriptor per visible
 * subcommand. Run on every tools/list; the schema never changes while the
 * process lives, so there is nothing to cache or invalidate.
 *
 * Every value-bearing argument is typed "string": the schema exposes arity,
 * not the parsed value type.
 */

import { CommandSchemaAdapter, SchemaArgument, SchemaSubcommand } from '../schema/types';
import { InputShape, PropertyShape, ToolDescriptor } from './types';

function describeArgument(arg: SchemaArgument): PropertyShape {
  const shape: PropertyShape = {
    type: arg.minValues() === 0 ? 'boolean' : 'string'
  };
  if (arg.help) {
    shape.description = arg.help;
  }

  const token = arg.invocationToken();
  if (token !== undefined && token !== `--${arg.id}`) {
    shape['x-flag'] = token;
  }
  return shape;
}

export function describeSubcommand(sub: SchemaSubcommand): ToolDescriptor {
  const inputSchema: InputShape = { type: 'object', properties: {}, required: [] };
  let positionalCount = 0;

  for (const arg of sub.arguments()) {
    if (arg.isHidden() || arg.isImplicit()) continue;

    const shape = describeArgument(arg);

    if (arg.isPositional()) {
      shape['x-positional'] = true;
      shape['x-position'] = arg.declaredIndex() ?? positionalCount++;
    }

    inputSchema.properties[arg.id] = shape;
    if (arg.isRequired()) {
      inputSchema.required.push(arg.id);
    }
  }

  return {
    name: sub.name,
    description: sub.summary ?? '',
    inputSchema
  };
}

export function extractToolDescriptors<T>(schema: CommandSchemaAdapter<T>): ToolDescriptor[] {
  return schema
    .subcommands()
    .filter(sub => !sub.isHidden())
    .map(describeSubcommand);
}
