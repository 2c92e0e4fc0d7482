import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { createFramework } from '../core/config/Setup';
import { createLogger } from '../logging/Logger';

import type { Framework, KeelConfig } from '../core/config/types';
import type { LogLevel } from '../core/logging/types';
import type { DebugInput } from '../logging/Parser';

export const FIXTURES = join(dirname(fileURLToPath(import.meta.url)), 'fixtures');
export const APP_TEMPLATES = join(FIXTURES, 'app', 'templates');
export const BROKEN_TEMPLATES = join(FIXTURES, 'broken', 'templates');

type LogRecord = { level: LogLevel; meta: Record<string, unknown>; message: string };

export function makeMemoryLogger(debug?: DebugInput) {
  const records: LogRecord[] = [];

  const push = (level: LogLevel) => (meta?: Record<string, unknown>, message?: string) => {
    records.push({ level, meta: meta ?? {}, message: message ?? '' });
  };

  const logger = createLogger({
    debug,
    minLevel: 'debug',
    custom: {
      debug: push('debug'),
      info: push('info'),
      warn: push('warn'),
      error: push('error'),
    },
    includeContext: false,
  });

  const take = (level: LogLevel) => records.filter((r) => r.level === level);

  return { logger, records, take };
}

/** A framework over the fixture templates with the `Blog` and `Theme` plugins loaded. */
export function createTestFramework(config: KeelConfig = {}): Framework {
  return createFramework({
    debug: false,
    logger: makeMemoryLogger().logger,
    paths: { templates: [APP_TEMPLATES] },
    plugins: {
      Blog: { path: join(FIXTURES, 'plugins', 'blog') },
      Theme: { path: join(FIXTURES, 'plugins', 'theme') },
    },
    ...config,
  });
}
