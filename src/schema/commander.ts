/**
 * schema/commander.ts
 *
 * Command Schema Adapter over commander. The embedding CLI describes its
 * subcommands in an `augment` function; every listing or parse builds a
 * fresh command tree from it, so no parse state leaks between calls.
 *
 * Argument order per subcommand: positionals first (declaration order),
 * then options (declaration order). Commander keeps the two in separate
 * lists, so their interleaving in the source is not recoverable.
 */

import { Argument, Command, CommanderError, Option } from 'commander';
import {
  ArgMatches,
  CommandConverter,
  CommandSchemaAdapter,
  ConversionOutcome,
  PROGRAM_NAME,
  ParseOutcome,
  SchemaArgument,
  SchemaSubcommand
} from './types';


const IMPLICIT_ATTRIBUTES = new Set(['help', 'version']);

export interface CommanderSchemaOptions<T> {
  /** Declares subcommands, arguments and options on the given base node. */
  augment: (program: Command) => void;
  convert: CommandConverter<T>;
}

// ---------------------------------------------------------------------------
// Argument views
// ---------------------------------------------------------------------------

class PositionalArgument implements SchemaArgument {
  readonly id: string;
  readonly help?: string;

  constructor(private readonly arg: Argument, private readonly index: number) {
    this.id = arg.name();
    this.help = arg.description || undefined;
  }

  isPositional(): boolean { return true; }
  declaredIndex(): number | undefined { return this.index; }
  isRequired(): boolean { return this.arg.required; }
  isHidden(): boolean { return false; }
  isImplicit(): boolean { return false; }
  minValues(): number { return 1; }
  invocationToken(): string | undefined { return undefined; }
}

class OptionArgument implements SchemaArgument {
  readonly id: string;
  readonly help?: string;

  constructor(private readonly option: Option) {
    this.id = (option.long ?? option.short ?? option.flags).replace(/^-{1,2}/, '');
    this.help = option.description || undefined;
  }

  isPositional(): boolean { return false; }
  declaredIndex(): number | undefined { return undefined; }
  isRequired(): boolean { return this.option.mandatory; }
  isHidden(): boolean { return this.option.hidden; }

  isImplicit(): boolean {
    return IMPLICIT_ATTRIBUTES.has(this.option.attributeName());
  }

  minValues(): number {
    return this.option.isBoolean() || this.option.optional ? 0 : 1;
  }

  invocationToken(): string | undefined {
    return this.option.long ?? this.option.short;
  }
}

class CommanderSubcommand implements SchemaSubcommand {
  readonly name: string;
  readonly summary?: string;

  constructor(private readonly cmd: Command, private readonly hidden: boolean) {
    this.name = cmd.name();
    this.summary = cmd.description() || cmd.summary() || undefined;
  }

  isHidden(): boolean {
    return this.hidden;
  }

  arguments(): SchemaArgument[] {
    return [
      ...this.cmd.registeredArguments.map((arg, i) => new PositionalArgument(arg, i)),
      ...this.cmd.options.map(option => new OptionArgument(option))
    ];
  }
}

// ---------------------------------------------------------------------------
// Matches
// ---------------------------------------------------------------------------

/**
 * Reads what commander matched on a subcommand after a parse: positionals
 * under their argument names, options under their attribute names.
 */
export function collectMatches(cmd: Command): ArgMatches {
  const values: Record<string, unknown> = {};

  cmd.registeredArguments.forEach((arg, i) => {
    const value: unknown = cmd.processedArgs[i];
    if (value !== undefined) values[arg.name()] = value;
  });

  const options: Record<string, unknown> = cmd.opts();
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) values[key] = value;
  }

  return { subcommand: cmd.name(), values };
}

/** Parse failures throw instead of exiting; stray tokens are errors. */
function silence(cmd: Command): void {
  cmd.exitOverride();
  cmd.allowExcessArguments(false);
  cmd.configureOutput({
    writeOut: () => undefined,
    writeErr: () => undefined
  });
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export class CommanderSchema<T> implements CommandSchemaAdapter<T> {
  private readonly augment: (program: Command) => void;
  private readonly converter: CommandConverter<T>;

  constructor(options: CommanderSchemaOptions<T>) {
    this.augment = options.augment;
    this.converter = options.convert;
  }

  /** A fresh base node with every declared subcommand attached. */
  build(): Command {
    const program = new Command(PROGRAM_NAME).helpCommand(false);
    this.augment(program);
    return program;
  }

  subcommands(): SchemaSubcommand[] {
    const program = this.build();
    const visible = new Set(program.createHelp().visibleCommands(program));
    return program.commands.map(cmd => new CommanderSubcommand(cmd, !visible.has(cmd)));
  }

  tryParse(tokens: readonly string[]): ParseOutcome {
    const program = this.build();
    let matches: ArgMatches | undefined;

    silence(program);
    for (const sub of program.commands) {
      silence(sub);
      sub.action(() => {
        matches = collectMatches(sub);
      });
    }

    try {
      // First token is the program name; commander wants user args only.
      program.parse(tokens.slice(1), { from: 'user' });
    } catch (e) {
      if (e instanceof CommanderError) {
        return { matched: false, message: e.message };
      }
      throw e;
    }

    if (!matches) {
      return { matched: false, message: 'no subcommand matched the arguments' };
    }
    return { matched: true, matches };
  }

  convert(matches: ArgMatches): ConversionOutcome<T> {
    return this.converter(matches);
  }
}
