// src/config.ts

import { z } from 'zod';
import { DEFAULT_TCP_PORT, DEFAULT_TIMEOUT, DEFAULT_UNIT_ID } from './constants/constants.js';
import { ModbusConfigError } from './errors.js';

const ConfigSchema = z.object({
  MODBUS_HOST: z.string().trim().min(1, 'MODBUS_HOST is required'),
  MODBUS_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_TCP_PORT),
  MODBUS_UNIT_ID: z.coerce.number().int().min(0).max(255).default(DEFAULT_UNIT_ID),
  MODBUS_TIMEOUT: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT),
  MODBUS_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('warn'),
});

export interface ModbusConnectionConfig {
  host: string;
  port: number;
  unitId: number;
  timeout: number;
  logLevel: z.infer<typeof ConfigSchema>['MODBUS_LOG_LEVEL'];
}

/**
 * Reads connection settings from an environment-like record.
 * Empty strings count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ModbusConnectionConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('MODBUS_') && value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }

  const parsed = ConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ModbusConfigError(details);
  }

  const cfg = parsed.data;
  return {
    host: cfg.MODBUS_HOST,
    port: cfg.MODBUS_PORT,
    unitId: cfg.MODBUS_UNIT_ID,
    timeout: cfg.MODBUS_TIMEOUT,
    logLevel: cfg.MODBUS_LOG_LEVEL,
  };
}
