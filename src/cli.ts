#!/usr/bin/env node
// src/cli.ts

import { isErr, unwrapErr, unwrapOk } from 'option-t/plain_result';
import { type CliArgs, parseCliArgs, USAGE } from './cli-args.js';
import { ModbusTcpClient } from './client.js';
import { loadConfig, type ModbusConnectionConfig } from './config.js';
import { ModbusConfigError } from './errors.js';
import { rootLogger } from './logger.js';
import { NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';

async function main(): Promise<number> {
  let args: CliArgs;
  let config: ModbusConnectionConfig;
  try {
    args = parseCliArgs(process.argv.slice(2));
    config = loadConfig(process.env);
  } catch (err: unknown) {
    if (err instanceof ModbusConfigError) {
      console.error(err.message);
      console.error(USAGE);
      return 1;
    }
    throw err;
  }

  rootLogger.setLevel(config.logLevel);
  const transport = new NodeTcpTransport(config.host, config.port, {
    connectTimeout: config.timeout,
    readTimeout: config.timeout,
  });
  const client = new ModbusTcpClient(transport, { unitId: config.unitId, timeout: config.timeout });

  await transport.connect();
  try {
    const result = await client.execute({
      functionCode: args.functionCode,
      startingAddress: args.address,
      registerQuantity: args.quantity,
    });
    if (isErr(result)) {
      console.error(unwrapErr(result).message);
      return 1;
    }
    for (const value of unwrapOk(result).registers.values) {
      console.log(String(value));
    }
    return 0;
  } finally {
    await transport.disconnect();
  }
}

main().then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    process.exitCode = 1;
  }
);
