// src/logger.ts

import { describeException } from './exception-codes.js';
import { functionCodeName } from './function-codes/read-functions.js';
import type { LogContext, LoggerInstance, LogLevel, LogRecord } from './types/modbus-types.js';

type LogField = keyof LogContext | 'timestamp' | 'level' | 'logger';

const LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const COLORS: Record<LogLevel | 'reset', string> = {
  trace: '\x1b[1;35m',
  debug: '\x1b[1;36m',
  info: '\x1b[1;32m',
  warn: '\x1b[1;33m',
  error: '\x1b[1;31m',
  reset: '\x1b[0m',
};

const VALID_FIELDS: LogField[] = [
  'timestamp',
  'level',
  'logger',
  'unitId',
  'funcCode',
  'exceptionCode',
  'transactionId',
  'address',
  'quantity',
  'responseTime',
];

function isLogContext(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

export class Logger {
  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = process.stdout.isTTY === true;
  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = [...VALID_FIELDS];
  private filters: {
    unitId: Set<number>;
    funcCode: Set<number>;
    exceptionCode: Set<number>;
  } = { unitId: new Set(), funcCode: new Set(), exceptionCode: new Set() };
  private watchCallback: ((record: LogRecord) => void) | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Formats a log line: `[time][LEVEL][logger][U:1][F:0x03/READ_HOLDING_REGISTERS] message {...}`
   */
  format(level: LogLevel, args: unknown[], context: LogContext = {}): string {
    const merged: LogContext = { ...this.globalContext, ...context };
    const color = this.useColors ? COLORS[level] : '';
    const reset = this.useColors ? COLORS.reset : '';

    const headerParts: string[] = [];
    for (const field of this.logFormat) {
      switch (field) {
        case 'timestamp':
          headerParts.push(`[${this.getTimestamp()}]`);
          break;
        case 'level':
          headerParts.push(`[${level.toUpperCase()}]`);
          break;
        case 'logger':
          if (merged.logger) headerParts.push(`[${merged.logger}]`);
          break;
        case 'unitId':
          if (merged.unitId != null) headerParts.push(`[U:${merged.unitId}]`);
          break;
        case 'funcCode':
          if (merged.funcCode != null) {
            const hex = merged.funcCode.toString(16).padStart(2, '0');
            headerParts.push(`[F:0x${hex}/${functionCodeName(merged.funcCode)}]`);
          }
          break;
        case 'exceptionCode':
          if (merged.exceptionCode != null) {
            headerParts.push(
              `[E:${merged.exceptionCode}/${describeException(merged.exceptionCode).split(':')[0]}]`
            );
          }
          break;
        case 'transactionId':
          if (merged.transactionId != null) headerParts.push(`[T:${merged.transactionId}]`);
          break;
        case 'address':
          if (merged.address != null) headerParts.push(`[A:${merged.address}]`);
          break;
        case 'quantity':
          if (merged.quantity != null) headerParts.push(`[Q:${merged.quantity}]`);
          break;
        case 'responseTime':
          if (merged.responseTime != null) headerParts.push(`[RT:${merged.responseTime}ms]`);
          break;
        default:
          break;
      }
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      return String(arg);
    });

    return `${color}${headerParts.join('')}${reset} ${formattedArgs.join(' ')}`.trimEnd();
  }

  private shouldLog(level: LogLevel, context: LogContext): boolean {
    if (!this.enabled) return false;
    if (context.unitId != null && this.filters.unitId.has(context.unitId)) return false;
    if (context.funcCode != null && this.filters.funcCode.has(context.funcCode)) return false;
    if (context.exceptionCode != null && this.filters.exceptionCode.has(context.exceptionCode))
      return false;

    const category = context.logger ? this.categoryLevels[context.logger] : undefined;
    if (category === 'none') return false;
    const threshold = category ?? this.currentLevel;
    return LEVELS.indexOf(level) >= LEVELS.indexOf(threshold);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level]++;
    if (this.watchCallback) {
      this.watchCallback({ level, args, context: { ...this.globalContext, ...context } });
    }

    const line = this.format(level, args, context);
    if (level === 'error' || level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  /**
   * Splits off a trailing plain object as the log context.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra });
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  setLevel(level: LogLevel): void {
    if (!LEVELS.includes(level)) {
      throw new Error(`Unknown log level: ${String(level)}`);
    }
    this.currentLevel = level;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !LEVELS.includes(level)) {
      throw new Error(`Unknown log level: ${String(level)}`);
    }
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setColors(value: boolean): void {
    this.useColors = value;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => VALID_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  mute({ unitId, funcCode, exceptionCode }: Partial<LogContext> = {}): void {
    if (unitId != null) this.filters.unitId.add(unitId);
    if (funcCode != null) this.filters.funcCode.add(funcCode);
    if (exceptionCode != null) this.filters.exceptionCode.add(exceptionCode);
  }

  unmute({ unitId, funcCode, exceptionCode }: Partial<LogContext> = {}): void {
    if (unitId != null) this.filters.unitId.delete(unitId);
    if (funcCode != null) this.filters.funcCode.delete(funcCode);
    if (exceptionCode != null) this.filters.exceptionCode.delete(exceptionCode);
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Readonly<Record<LogLevel, number>> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger instance with category.
   * @param name - Logger name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

/** Process-wide logger shared by the transport, protocol and client */
export const rootLogger = new Logger();
