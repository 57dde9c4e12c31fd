import { createAjvConverter } from '../schema/converter';

type Greeting = { command: 'hello'; name: string; times: number };

const greetingSchema = {
  $id: 'greeting',
  type: 'object',
  properties: {
    name: { type: 'string' },
    times: { type: 'integer', default: 1 }
  },
  required: ['name']
};

describe('Ajv command converter', () => {
  it('should coerce matched text and fill defaults', () => {
    const convert = createAjvConverter<Greeting>({ hello: greetingSchema });
    expect(convert({ subcommand: 'hello', values: { name: 'Ada' } })).toEqual({
      converted: true,
      value: { command: 'hello', name: 'Ada', times: 1 }
    });
    expect(convert({ subcommand: 'hello', values: { name: 'Ada', times: '3' } })).toEqual({
      converted: true,
      value: { command: 'hello', name: 'Ada', times: 3 }
    });
  });

  it('should describe values that do not convert', () => {
    const convert = createAjvConverter<Greeting>({ hello: greetingSchema });
    expect(convert({ subcommand: 'hello', values: { name: 'Ada', times: 'often' } })).toEqual({
      converted: false,
      message: 'hello/times must be integer'
    });
  });

  it('should report subcommands with no registered schema', () => {
    const convert = createAjvConverter<Greeting>({ hello: greetingSchema });
    expect(convert({ subcommand: 'bye', values: {} })).toEqual({
      converted: false,
      message: 'no conversion registered for subcommand "bye"'
    });
  });

  it('should let separate converters reuse a schema id', () => {
    const first = createAjvConverter<Greeting>({ hello: greetingSchema });
    const second = createAjvConverter<Greeting>({ hello: greetingSchema });
    expect(first({ subcommand: 'hello', values: { name: 'Ada' } }).converted).toBe(true);
    expect(second({ subcommand: 'hello', values: { name: 'Grace' } })).toEqual({
      converted: true,
      value: { command: 'hello', name: 'Grace', times: 1 }
    });
  });
});
