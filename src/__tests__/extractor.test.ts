import { extractToolDescriptors, describeSubcommand } from '../core/extractor';
import { SchemaArgument, SchemaSubcommand } from '../schema/types';
import { createTestSchema } from './fixtures/commands';

function findTool(name: string) {
  const tool = extractToolDescriptors(createTestSchema()).find(t => t.name === name);
  if (!tool) throw new Error(`tool ${name} not listed`);
  return tool;
}

describe('Tool Descriptor Extractor', () => {
  it('should list one descriptor per visible subcommand in declaration order', () => {
    const names = extractToolDescriptors(createTestSchema()).map(t => t.name);
    expect(names).toEqual(['add', 'divide', 'hello', 'from-utf8', 'mixed', 'tag']);
  });

  it('should describe named options as strings with their help text', () => {
    expect(findTool('add')).toEqual({
      name: 'add',
      description: 'Add two numbers',
      inputSchema: {
        type: 'object',
        properties: {
          a: { type: 'string', description: 'First number' },
          b: { type: 'string', description: 'Second number' }
        },
        required: ['a', 'b']
      }
    });
  });

  it('should describe flags as booleans and leave out hidden options', () => {
    const hello = findTool('hello');
    expect(hello.inputSchema.properties).toEqual({
      name: { type: 'string', description: 'Name to greet' },
      excited: { type: 'boolean', description: 'Use enthusiastic greeting' }
    });
    expect(hello.inputSchema.required).toEqual(['name']);
  });

  it('should mark positionals with their declared position', () => {
    const tool = findTool('from-utf8');
    expect(tool.inputSchema.properties.text).toEqual({
      type: 'string',
      description: 'Text to encode',
      'x-positional': true,
      'x-position': 0
    });
    expect(tool.inputSchema.properties.optional).toEqual({
      type: 'string',
      'x-positional': true,
      'x-position': 1
    });
    expect(tool.inputSchema.required).toEqual(['text']);
  });

  it('should list positionals before options', () => {
    const tool = findTool('mixed');
    expect(Object.keys(tool.inputSchema.properties)).toEqual(['input', 'output', 'verbose']);
    expect(tool.inputSchema.properties.output['x-position']).toBe(1);
    expect(tool.description).toBe('');
  });

  it('should record the flag of an option that has no long form', () => {
    expect(findTool('tag').inputSchema.properties.t).toEqual({
      type: 'string',
      description: 'Label to attach',
      'x-flag': '-t'
    });
  });

  it('should number positionals in order when the schema gives no index', () => {
    const positional = (id: string): SchemaArgument => ({
      id,
      isPositional: () => true,
      declaredIndex: () => undefined,
      isRequired: () => true,
      isHidden: () => false,
      isImplicit: () => false,
      minValues: () => 1,
      invocationToken: () => undefined
    });
    const sub: SchemaSubcommand = {
      name: 'copy',
      isHidden: () => false,
      arguments: () => [positional('from'), positional('to')]
    };

    const tool = describeSubcommand(sub);
    expect(tool.inputSchema.properties.from['x-position']).toBe(0);
    expect(tool.inputSchema.properties.to['x-position']).toBe(1);
    expect(tool.inputSchema.required).toEqual(['from', 'to']);
  });

  it('should skip implicit arguments', () => {
    const sub: SchemaSubcommand = {
      name: 'version-only',
      summary: 'Prints a version',
      isHidden: () => false,
      arguments: () => [
        {
          id: 'version',
          isPositional: () => false,
          declaredIndex: () => undefined,
          isRequired: () => false,
          isHidden: () => false,
          isImplicit: () => true,
          minValues: () => 0,
          invocationToken: () => '--version'
        }
      ]
    };

    expect(describeSubcommand(sub)).toEqual({
      name: 'version-only',
      description: 'Prints a version',
      inputSchema: { type: 'object', properties: {}, required: [] }
    });
  });
});
