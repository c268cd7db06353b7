// src/logger.ts

import { ModbusFunctionCode } from './constants/constants.js';
import type {
  LogContext,
  LogField,
  LoggerInstance,
  LogLevel,
  LogRecord,
} from './types/modbus-types.js';

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private droppedCount: number = 0;
  private logFormat: LogField[] = [
    'timestamp',
    'level',
    'logger',
    'unitId',
    'funcCode',
    'transactionId',
  ];
  private watchCallback: ((record: LogRecord) => void) | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Formats a log message according to the specified level and context.
   * @param level - Log level (trace, debug, info, warn, error)
   * @param args - Arguments to be logged
   * @param context - Context object with additional information
   * @returns Formatted log message parts, header first
   */
  format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && context.logger) headerParts.push(`[${context.logger}]`);
    if (this.logFormat.includes('unitId') && context.unitId != null) {
      headerParts.push(`[U:${context.unitId}]`);
    }
    if (this.logFormat.includes('funcCode') && context.funcCode != null) {
      const funcName = ModbusFunctionCode[context.funcCode] ?? 'Unknown';
      headerParts.push(`[F:0x${context.funcCode.toString(16).padStart(2, '0')}/${funcName}]`);
    }
    if (this.logFormat.includes('transactionId') && context.transactionId != null) {
      headerParts.push(`[T:${context.transactionId}]`);
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      return String(arg);
    });

    // Остальной контекст печатаем как JSON, служебные поля уже в заголовке
    const rest: LogContext = { ...context };
    delete rest.logger;
    delete rest.unitId;
    delete rest.funcCode;
    delete rest.transactionId;
    if (Object.keys(rest).length > 0) {
      formattedArgs.push(JSON.stringify(rest));
    }

    return [`${color}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  private shouldLog(level: LogLevel, context: LogContext): boolean {
    if (!this.enabled) return false;
    const category = context.logger;
    if (category !== undefined && category in this.categoryLevels) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none') return false;
      return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level]++;

    // console.trace печатает стек, поэтому trace идёт в debug
    const sink = level === 'trace' ? console.debug : console[level];
    try {
      this.watchCallback?.({ level, args, context });
      sink(...this.format(level, args, context));
    } catch {
      // Сбой наблюдателя или вывода не должен ломать обмен
      this.droppedCount++;
    }
  }

  /**
   * Splits the arguments into the main arguments and the context object.
   * The last argument is taken as context when it is a plain object.
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

  private log(level: LogLevel, args: unknown[], category?: string): void {
    const split = this.splitArgsAndContext(args);
    const context = category ? { ...split.context, logger: category } : split.context;
    this.output(level, split.args, context);
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
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
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

  disableColors(): void {
    this.useColors = false;
  }

  setLogFormat(fields: LogField[]): void {
    this.logFormat = [...fields];
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

  /** Сообщения, которые не удалось вывести */
  getDroppedCount(): number {
    return this.droppedCount;
  }

  resetCounts(): void {
    this.logCounts = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
    this.droppedCount = 0;
  }

  /**
   * Creates a logger instance with category.
   * @param name - Logger name
   * @returns Logger instance
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, name),
      debug: (...args: unknown[]) => this.log('debug', args, name),
      info: (...args: unknown[]) => this.log('info', args, name),
      warn: (...args: unknown[]) => this.log('warn', args, name),
      error: (...args: unknown[]) => this.log('error', args, name),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Error) &&
    !(value instanceof Uint8Array)
  );
}

/** Общий логгер библиотеки; модули берут из него свои категории */
export const modbusLogger = new Logger();

export default Logger;
