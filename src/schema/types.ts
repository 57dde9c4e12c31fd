/**
 * schema/types.ts
 *
 * The capability interface the core reads a command schema through.
 * The extractor and marshaller never touch the CLI library directly.
 */

/** Program name heading every token sequence; subcommands hang off it. */
export const PROGRAM_NAME = 'mcp';

/** One argument of a subcommand, as the extractor sees it. */
export interface SchemaArgument {
  readonly id: string;
  readonly help?: string;

  /** True when the argument is supplied by position rather than a flag. */
  isPositional(): boolean;

  /** Zero-based index among the subcommand's positionals, when the schema declares one. */
  declaredIndex(): number | undefined;

  isRequired(): boolean;
  isHidden(): boolean;

  /** Help and version switches the CLI library adds on its own. */
  isImplicit(): boolean;

  /** Minimum number of values the argument takes; 0 means a flag. */
  minValues(): number;

  /** The token that introduces a named argument, e.g. `--name` or `-q`. */
  invocationToken(): string | undefined;
}

export interface SchemaSubcommand {
  readonly name: string;
  readonly summary?: string;
  isHidden(): boolean;
  arguments(): SchemaArgument[];
}

/** Values a parse matched for one subcommand, keyed by argument attribute name. */
export interface ArgMatches {
  subcommand: string;
  values: Record<string, unknown>;
}

export type ParseOutcome =
  | { matched: true; matches: ArgMatches }
  | { matched: false; message: string };

export type ConversionOutcome<T> =
  | { converted: true; value: T }
  | { converted: false; message: string };

export type CommandConverter<T> = (matches: ArgMatches) => ConversionOutcome<T>;

export interface CommandSchemaAdapter<T> {
  /** Top-level subcommands in declaration order, from a freshly built command tree. */
  subcommands(): SchemaSubcommand[];

  /** Parses a full token sequence (program name first) against the whole tree. */
  tryParse(tokens: readonly string[]): ParseOutcome;

  convert(matches: ArgMatches): ConversionOutcome<T>;
}
