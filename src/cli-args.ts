// src/cli-args.ts

import { ModbusFunctionCode } from './constants/constants.js';
import { ModbusConfigError } from './errors.js';

export const READ_COMMANDS: ReadonlyMap<string, ModbusFunctionCode> = new Map([
  ['coils', ModbusFunctionCode.READ_COILS],
  ['discrete-inputs', ModbusFunctionCode.READ_DISCRETE_INPUTS],
  ['holding-registers', ModbusFunctionCode.READ_HOLDING_REGISTERS],
  ['input-registers', ModbusFunctionCode.READ_INPUT_REGISTERS],
]);

export const USAGE = `Usage: modbus-read <${[...READ_COMMANDS.keys()].join('|')}> <address> <quantity>

Connection settings come from the environment:
  MODBUS_HOST       server address (required)
  MODBUS_PORT       TCP port (default 502)
  MODBUS_UNIT_ID    unit identifier (default 1)
  MODBUS_TIMEOUT    connect/read timeout in ms (default 1000)
  MODBUS_LOG_LEVEL  trace|debug|info|warn|error (default warn)`;

export interface CliArgs {
  functionCode: ModbusFunctionCode;
  address: number;
  quantity: number;
}

function parseInteger(name: string, raw: string): number {
  const value = /^0x[0-9a-f]+$/i.test(raw) ? parseInt(raw, 16) : Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value)) {
    throw new ModbusConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Parses `<command> <address> <quantity>`. Range checks are left to the request builder.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  if (argv.length !== 3) {
    throw new ModbusConfigError(`expected 3 arguments, got ${argv.length}`);
  }
  const [command, address, quantity] = argv;
  const functionCode = READ_COMMANDS.get(command);
  if (functionCode === undefined) {
    throw new ModbusConfigError(`unknown command "${command}"`);
  }
  return {
    functionCode,
    address: parseInteger('address', address),
    quantity: parseInteger('quantity', quantity),
  };
}
