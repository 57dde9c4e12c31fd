import { ToolRegistry } from '../core/registry';
import { InvalidArgumentsError, UnknownToolError } from '../core/errors';
import { createTestSchema, runTestCommand, TestCommand } from './fixtures/commands';

describe('ToolRegistry', () => {
  const registry = new ToolRegistry<TestCommand>(createTestSchema(), runTestCommand);

  it('should list the visible tools', () => {
    expect(registry.list()).toHaveLength(6);
    expect(registry.hasHandler).toBe(true);
  });

  it('should run add through the handler', async () => {
    const result = await registry.invoke({ toolName: 'add', arguments: { a: 10, b: 32 } });
    expect(result).toEqual({ content: [{ type: 'text', text: '10 + 32 = 42' }], isError: false });
  });

  it('should return handler failures as error results', async () => {
    const result = await registry.invoke({ toolName: 'divide', arguments: { dividend: 1, divisor: 0 } });
    expect(result).toEqual({ content: [{ type: 'text', text: 'Division by zero' }], isError: true });
  });

  it('should pass positionals through in order', async () => {
    const utf8 = await registry.invoke({ toolName: 'from-utf8', arguments: { text: 'hello' } });
    expect(utf8.content[0].text).toBe('0x68656c6c6f (optional: None)');

    const mixed = await registry.invoke({
      toolName: 'mixed',
      arguments: { verbose: true, output: 'bar.txt', input: 'foo.txt' }
    });
    expect(mixed.content[0].text).toBe('input=foo.txt output=bar.txt verbose=true');
  });

  it('should reject unknown tools naming the tool', async () => {
    await expect(registry.invoke({ toolName: 'nope', arguments: {} })).rejects.toThrow(UnknownToolError);
    await expect(registry.invoke({ toolName: 'nope', arguments: {} })).rejects.toThrow('Unknown tool: "nope"');
  });

  it('should not resolve hidden subcommands', () => {
    expect(() => registry.resolve('secret')).toThrow(UnknownToolError);
  });

  it('should reject a call missing a required argument', async () => {
    await expect(registry.invoke({ toolName: 'hello', arguments: { excited: true } })).rejects.toThrow(InvalidArgumentsError);
  });

  it('should answer with the handler-unset result when no handler was given', async () => {
    const bare = new ToolRegistry<TestCommand>(createTestSchema());
    const result = await bare.invoke({ toolName: 'add', arguments: { a: 1, b: 2 } });
    expect(bare.hasHandler).toBe(false);
    expect(result.isError).toBe(true);
    expect(result.content[0].text).toMatch(/^No command handler provided\./);
  });
});
