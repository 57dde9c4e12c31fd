/**
 * schema/converter.ts
 *
 * Turns matched values into a typed command with ajv. Each subcommand gets
 * a JSON Schema describing its command object; ajv coerces the text values
 * commander produced ("10" → 10) and fills declared defaults.
 *
 * The command object carries the subcommand name under `command`, so
 * handlers can switch on it as a discriminated union.
 */

import Ajv, { SchemaObject, ValidateFunction } from 'ajv';
import { CommandConverter } from './types';

export function createAjvConverter<T>(schemas: Record<string, SchemaObject>): CommandConverter<T> {
  // One instance per converter: schema ids only have to be unique within it.
  const ajv = new Ajv({ allErrors: true, coerceTypes: true, useDefaults: true });
  const validators = new Map<string, ValidateFunction<T>>();
  for (const [name, schema] of Object.entries(schemas)) {
    validators.set(name, ajv.compile<T>(schema));
  }

  return matches => {
    const validate = validators.get(matches.subcommand);
    if (!validate) {
      return { converted: false, message: `no conversion registered for subcommand "${matches.subcommand}"` };
    }

    const candidate: Record<string, unknown> = { command: matches.subcommand, ...matches.values };
    if (validate(candidate)) {
      return { converted: true, value: candidate };
    }
    return {
      converted: false,
      message: ajv.errorsText(validate.errors, { dataVar: matches.subcommand })
    };
  };
}
