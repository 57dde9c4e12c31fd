/**
 * A calculator CLI that can also run as an MCP server.
 *
 *   calculator add -a 10 -b 32           → 10 + 32 = 42
 *   calculator --mcp                     → MCP over stdio
 *   calculator --mcp --mcp-port 8080     → MCP over HTTP/SSE
 */

import { Command } from 'commander';
import {
  CommandOutcome,
  CommanderSchema,
  McpServer,
  addMcpOptions,
  createAjvConverter,
  errorMessage,
  fail,
  ok,
  runMcpMode
} from '../src';
import { collectMatches } from '../src/schema/commander';

type CalculatorCommand =
  | { command: 'add'; a: number; b: number }
  | { command: 'subtract'; x: number; y: number }
  | { command: 'multiply'; value1: number; value2: number }
  | { command: 'divide'; dividend: number; divisor: number }
  | { command: 'hello'; name: string; excited: boolean };

const numbers = (...names: string[]) => ({
  type: 'object',
  properties: Object.fromEntries(names.map(n => [n, { type: 'number' }])),
  required: names
});

function declareCommands(program: Command): void {
  program
    .command('add')
    .description('Add two numbers')
    .requiredOption('-a, --a <number>', 'First number')
    .requiredOption('-b, --b <number>', 'Second number');

  program
    .command('subtract')
    .description('Subtract two numbers')
    .requiredOption('-x, --x <number>', 'First number')
    .requiredOption('-y, --y <number>', 'Second number');

  program
    .command('multiply')
    .description('Multiply two numbers')
    .requiredOption('--value1 <number>', 'First number')
    .requiredOption('--value2 <number>', 'Second number');

  program
    .command('divide')
    .description('Divide two numbers')
    .requiredOption('--dividend <number>', 'Dividend')
    .requiredOption('--divisor <number>', 'Divisor');

  program
    .command('hello')
    .description('Say hello to someone')
    .requiredOption('-n, --name <name>', 'Name to greet')
    .option('-e, --excited', 'Use enthusiastic greeting');
}

const schema = new CommanderSchema<CalculatorCommand>({
  augment: declareCommands,
  convert: createAjvConverter<CalculatorCommand>({
    add: numbers('a', 'b'),
    subtract: numbers('x', 'y'),
    multiply: numbers('value1', 'value2'),
    divide: numbers('dividend', 'divisor'),
    hello: {
      type: 'object',
      properties: {
        name: { type: 'string' },
        excited: { type: 'boolean', default: false }
      },
      required: ['name']
    }
  })
});

function execute(cmd: CalculatorCommand): CommandOutcome {
  switch (cmd.command) {
    case 'add':
      return ok(`${cmd.a} + ${cmd.b} = ${cmd.a + cmd.b}`);
    case 'subtract':
      return ok(`${cmd.x} - ${cmd.y} = ${cmd.x - cmd.y}`);
    case 'multiply':
      return ok(`${cmd.value1} * ${cmd.value2} = ${cmd.value1 * cmd.value2}`);
    case 'divide':
      if (cmd.divisor === 0) return fail('Error: Division by zero!');
      return ok(`${cmd.dividend} / ${cmd.divisor} = ${cmd.dividend / cmd.divisor}`);
    case 'hello':
      return ok(cmd.excited ? `Hello, ${cmd.name}!!!` : `Hello, ${cmd.name}.`);
  }
}

function report(outcome: CommandOutcome): void {
  if (outcome.ok) {
    process.stdout.write(`${outcome.output}\n`);
  } else {
    process.stderr.write(`${outcome.error}\n`);
    process.exitCode = 1;
  }
}

async function main(): Promise<void> {
  const program = new Command('calculator')
    .description('A simple calculator CLI that can also run as an MCP server')
    .version('1.0');
  addMcpOptions(program);
  declareCommands(program);

  for (const sub of program.commands) {
    sub.action(() => {
      const converted = schema.convert(collectMatches(sub));
      report(converted.converted ? execute(converted.value) : fail(converted.message));
    });
  }

  const server = new McpServer(schema, { name: 'calculator', version: '1.0' }).withHandler(execute);
  if (!(await runMcpMode(program, server))) {
    await program.parseAsync();
  }
}

main().catch((e: unknown) => {
  process.stderr.write(`Fatal error: ${errorMessage(e)}\n`);
  process.exit(1);
});
