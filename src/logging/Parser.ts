import { DEBUG_CATEGORIES } from '../core/logging/types';

import type { DebugCategory, DebugConfig } from '../core/logging/types';

export type DebugInput = DebugConfig | string | boolean | Array<DebugCategory | `-${DebugCategory}`> | undefined;

type DebugFlags = { all?: boolean } & Partial<Record<DebugCategory, boolean>>;

export const isDebugCategory = (value: string): value is DebugCategory => (DEBUG_CATEGORIES as readonly string[]).includes(value);

function collectTokens(tokens: readonly string[]): { on: Set<DebugCategory>; off: Set<DebugCategory> } {
  const on = new Set<DebugCategory>();
  const off = new Set<DebugCategory>();

  for (const token of tokens) {
    const neg = token.startsWith('-') || token.startsWith('!');
    const key = neg ? token.slice(1) : token;

    if (!isDebugCategory(key)) {
      console.warn(`[parseDebugInput] Invalid debug category: "${key}". Valid: ${DEBUG_CATEGORIES.join(', ')}`);
      continue;
    }

    (neg ? off : on).add(key);
  }

  return { on, off };
}

export function parseDebugInput(input: DebugInput): DebugConfig | undefined {
  if (input === undefined) return undefined;
  if (typeof input === 'boolean') return input;

  if (Array.isArray(input)) {
    const { on, off } = collectTokens(input.map(String));

    if (off.size > 0 && on.size === 0) {
      const flags: DebugFlags = { all: true };

      for (const k of off) flags[k] = false;

      return flags;
    }

    if (on.size > 0 || off.size > 0) {
      const flags: DebugFlags = {};

      for (const k of on) flags[k] = true;
      for (const k of off) flags[k] = false;

      return flags;
    }

    return undefined;
  }

  if (typeof input === 'string') {
    const raw = input.trim();

    if (!raw) return undefined;
    if (raw === '*' || raw.toLowerCase() === 'true' || raw.toLowerCase() === 'all') return true;

    const parts = raw
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
    const { on, off } = collectTokens(parts);
    const flags: DebugFlags = {};

    if (off.size > 0 && on.size === 0) {
      flags.all = true;

      for (const k of off) flags[k] = false;

      return flags;
    }

    for (const k of on) flags[k] = true;
    for (const k of off) flags[k] = false;

    return flags;
  }

  return input;
}
