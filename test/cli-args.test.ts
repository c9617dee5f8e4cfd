import { describe, expect, it } from 'vitest';
import { READ_COMMANDS, USAGE, parseCliArgs } from '../src/cli-args.js';
import { ModbusFunctionCode } from '../src/constants/constants.js';
import { ModbusConfigError } from '../src/errors.js';

describe('parseCliArgs', () => {
  it('maps each command to its function code', () => {
    expect(parseCliArgs(['coils', '0', '8'])).toEqual({
      functionCode: ModbusFunctionCode.READ_COILS,
      address: 0,
      quantity: 8,
    });
    expect(parseCliArgs(['input-registers', '100', '2']).functionCode).toBe(
      ModbusFunctionCode.READ_INPUT_REGISTERS
    );
  });

  it('accepts hexadecimal numbers', () => {
    expect(parseCliArgs(['holding-registers', '0x10', '0X7D'])).toEqual({
      functionCode: ModbusFunctionCode.READ_HOLDING_REGISTERS,
      address: 16,
      quantity: 125,
    });
  });

  it('leaves range checks to the request builder', () => {
    expect(parseCliArgs(['discrete-inputs', '70000', '0'])).toEqual({
      functionCode: ModbusFunctionCode.READ_DISCRETE_INPUTS,
      address: 70000,
      quantity: 0,
    });
  });

  it('requires exactly three arguments', () => {
    expect(() => parseCliArgs(['coils', '0'])).toThrow(
      'Configuration error: expected 3 arguments, got 2'
    );
  });

  it('rejects unknown commands', () => {
    expect(() => parseCliArgs(['write-coils', '0', '1'])).toThrow(
      'Configuration error: unknown command "write-coils"'
    );
    expect(() => parseCliArgs(['toString', '0', '1'])).toThrow(ModbusConfigError);
  });

  it.each(['abc', '1.5', '', ' ', '0xZZ'])('rejects address %j', address => {
    expect(() => parseCliArgs(['coils', address, '1'])).toThrow(
      `Configuration error: address must be an integer, got "${address}"`
    );
  });

  it('lists every command in the usage text', () => {
    for (const command of READ_COMMANDS.keys()) {
      expect(USAGE).toContain(command);
    }
  });
});
