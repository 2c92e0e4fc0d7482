import pc from 'picocolors';

import { parseDebugInput, isDebugCategory } from './Parser';
import { DEBUG_CATEGORIES, type BaseLogger, type DebugCategory, type DebugConfig, type Logs, type LogLevel } from '../core/logging/types';

import type { DebugInput } from './Parser';

export { DEBUG_CATEGORIES };
export type { DebugCategory, DebugConfig, Logs, BaseLogger, LogLevel };

type Sink = (meta: Record<string, unknown>, message: string) => void;

export type LoggerConfig = {
  custom?: BaseLogger;
  context?: Record<string, unknown>;
  minLevel?: LogLevel;
  includeStack?: boolean | ((level: LogLevel) => boolean);
  includeContext?: boolean | ((level: LogLevel) => boolean);
  singleLine?: boolean;
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null && !Array.isArray(value);

export class Logger implements Logs {
  private debugEnabled = new Set<DebugCategory>();
  private context: Record<string, unknown> = {};

  constructor(private config: LoggerConfig = {}) {
    if (config.context) this.context = { ...config.context };
  }

  child(context: Record<string, unknown>): Logger {
    const customChild = this.config.custom?.child?.(context) ?? this.config.custom;
    const child = new Logger({ ...this.config, custom: customChild, context: { ...this.context, ...context } });
    child.debugEnabled = new Set(this.debugEnabled);
    return child;
  }

  configure(debug?: DebugConfig): void {
    this.debugEnabled.clear();

    if (debug === true) {
      this.debugEnabled = new Set(DEBUG_CATEGORIES);
    } else if (Array.isArray(debug)) {
      this.debugEnabled = new Set(debug);
    } else if (typeof debug === 'object' && debug) {
      if (debug.all) this.debugEnabled = new Set(DEBUG_CATEGORIES);

      Object.entries(debug).forEach(([key, value]) => {
        if (key !== 'all' && isDebugCategory(key) && typeof value === 'boolean') {
          if (value) this.debugEnabled.add(key);
          else this.debugEnabled.delete(key);
        }
      });
    }
  }

  isDebugEnabled(category: DebugCategory): boolean {
    return this.debugEnabled.has(category);
  }

  private shouldEmit(level: LogLevel): boolean {
    const minLevel = this.config.minLevel ?? 'info';

    return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  }

  private shouldIncludeStack(level: LogLevel): boolean {
    const include = this.config.includeStack;

    if (include === undefined) return level === 'error' || (level === 'warn' && process.env.NODE_ENV !== 'production');

    if (typeof include === 'boolean') return include;

    return include(level);
  }

  private stripStacks(meta: unknown, seen = new WeakSet<object>()): unknown {
    if (!meta || typeof meta !== 'object') return meta;
    if (seen.has(meta)) return '[circular]';
    seen.add(meta);

    if (Array.isArray(meta)) return meta.map((v) => this.stripStacks(v, seen));

    const copy: Record<string, unknown> = { ...meta };
    for (const k of Object.keys(copy)) {
      if (k === 'stack' || k.endsWith('Stack')) {
        delete copy[k];
      } else {
        copy[k] = this.stripStacks(copy[k], seen);
      }
    }

    return copy;
  }

  private formatTimestamp(): string {
    const now = new Date();
    if (process.env.NODE_ENV === 'production') return now.toISOString();

    const hours = String(now.getHours()).padStart(2, '0');
    const minutes = String(now.getMinutes()).padStart(2, '0');
    const seconds = String(now.getSeconds()).padStart(2, '0');
    const millis = String(now.getMilliseconds()).padStart(3, '0');

    return `${hours}:${minutes}:${seconds}.${millis}`;
  }

  private sinkFor(level: LogLevel): Sink | undefined {
    const custom = this.config.custom;
    const method = custom?.[level];
    if (!custom || typeof method !== 'function') return undefined;

    return (meta, message) => method.call(custom, meta, message);
  }

  private colourTag(level: LogLevel, tag: string): string {
    switch (level) {
      case 'debug':
        return pc.gray(tag);
      case 'info':
        return pc.cyan(tag);
      case 'warn':
        return pc.yellow(tag);
      case 'error':
        return pc.red(tag);
    }
  }

  private emit(level: LogLevel, message: string, meta?: unknown, category?: DebugCategory): void {
    if (!this.shouldEmit(level)) return;
    const timestamp = this.formatTimestamp();

    const wantCtx =
      this.config.includeContext === undefined
        ? false
        : typeof this.config.includeContext === 'function'
          ? this.config.includeContext(level)
          : this.config.includeContext;

    const sink = this.sinkFor(level);
    const consoleFallback = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

    let baseMeta: Record<string, unknown>;
    if (isRecord(meta)) {
      baseMeta = meta;
    } else if (meta === undefined) {
      baseMeta = {};
    } else {
      baseMeta = { value: meta };
    }

    const withCtx = wantCtx && Object.keys(this.context).length > 0 ? { context: this.context, ...baseMeta } : baseMeta;

    const finalMeta = this.shouldIncludeStack(level) ? withCtx : this.stripStacks(withCtx);
    const hasMeta = isRecord(finalMeta) && Object.keys(finalMeta).length > 0;

    const levelText = level + (category ? `:${category}` : '');
    const plainTag = `[${levelText}]`;

    const tagForOutput = sink ? plainTag : this.colourTag(level, plainTag);
    const formatted = `${timestamp} ${tagForOutput} ${message}`;

    if (this.config.singleLine && hasMeta && !sink) {
      const metaStr = JSON.stringify(finalMeta).replace(/\n/g, '\\n');
      consoleFallback(`${formatted} ${metaStr}`);
      return;
    }

    if (sink) {
      try {
        sink(hasMeta ? finalMeta : {}, formatted);
        return;
      } catch (sinkError) {
        console.warn(`${timestamp} ${this.colourTag('warn', '[warn]')} Log sink failed`, sinkError);
      }
    }

    if (hasMeta) consoleFallback(formatted, finalMeta);
    else consoleFallback(formatted);
  }

  info(meta?: unknown, message?: string): void {
    this.emit('info', message ?? '', meta);
  }

  warn(meta?: unknown, message?: string): void {
    this.emit('warn', message ?? '', meta);
  }

  error(meta?: unknown, message?: string): void {
    this.emit('error', message ?? '', meta);
  }

  debug(category: DebugCategory, meta?: unknown, message?: string): void {
    if (!this.debugEnabled.has(category)) return;

    this.emit('debug', message ?? '', meta, category);
  }
}

export function createLogger(opts?: LoggerConfig & { debug?: DebugInput }): Logger {
  const logger = new Logger({
    custom: opts?.custom,
    context: opts?.context,
    minLevel: opts?.minLevel,
    includeStack: opts?.includeStack,
    includeContext: opts?.includeContext,
    singleLine: opts?.singleLine,
  });

  const parsed = parseDebugInput(opts?.debug);
  if (parsed !== undefined) logger.configure(parsed);

  return logger;
}
