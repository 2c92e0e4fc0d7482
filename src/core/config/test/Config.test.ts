// @vitest-environment node
import { resolve } from 'node:path';
import { describe, it, expect } from 'vitest';

import { AppError } from '../../errors/AppError';
import { CORE_TEMPLATES, isDevelopment } from '../../system/System';
import { defineConfig, resolveConfig } from '../Config';

describe('defineConfig', () => {
  it('returns the config unchanged', () => {
    const handler = () => 'custom';
    const config = defineConfig({
      debug: true,
      plugins: { Blog: { path: '/srv/plugins/blog' } },
      errors: { handlers: { missingWidget: handler } },
    });

    expect(config.debug).toBe(true);
    expect(config.plugins.Blog.path).toBe('/srv/plugins/blog');
    expect(config.errors.handlers.missingWidget).toBe(handler);
  });

  it('rejects plugins without a path', () => {
    const run = () => defineConfig({ plugins: { Blog: { path: '' } } });

    expect(run).toThrow(AppError);
    expect(run).toThrow('Plugin "Blog" must declare a path');
  });

  it('rejects handler names that are not lower camel case', () => {
    const run = () => defineConfig({ errors: { handlers: { MissingWidget: () => 'x' } } });

    expect(run).toThrow('Error handler "MissingWidget" must be a lower camel case name');
  });

  it('reports validation errors as 400s', () => {
    try {
      defineConfig({ errors: { handlers: { 'missing-widget': () => 'x' } } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      expect(error instanceof AppError && error.kind).toBe('validation');
      expect(error instanceof AppError && error.code).toBe(400);
    }
  });
});

describe('resolveConfig', () => {
  it('fills defaults', () => {
    expect(resolveConfig()).toEqual({
      debug: isDevelopment,
      paths: { templates: [], core: CORE_TEMPLATES },
    });
  });

  it('resolves template roots to absolute paths', () => {
    const resolved = resolveConfig({ debug: true, paths: { templates: ['templates', '/srv/shared'] } });

    expect(resolved.debug).toBe(true);
    expect(resolved.paths.templates).toEqual([resolve('templates'), '/srv/shared']);
  });
});
