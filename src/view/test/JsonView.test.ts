// @vitest-environment node
import { describe, it, expect } from 'vitest';

import { createTestFramework } from '../../test/support';
import { JsonView } from '../JsonView';

import type { ViewParams } from '../View';

const makeView = (params: ViewParams) => new JsonView({ framework: createTestFramework(), params });

describe('JsonView', () => {
  it('serialises exactly the listed variables', () => {
    const view = makeView({ viewVars: { message: 'Hi', url: '/x', code: 404, secret: 's', _serialize: ['message', 'code'] } });

    expect(view.render()).toBe('{"message":"Hi","code":404}');
  });

  it('serialises every public variable for _serialize: true', () => {
    const view = makeView({ viewVars: { a: 1, b: 'two', _private: true, _serialize: true } });

    expect(view.render()).toBe('{"a":1,"b":"two"}');
  });

  it('serialises a single variable by name', () => {
    const view = makeView({ viewVars: { posts: [{ id: 1 }], _serialize: 'posts' } });

    expect(view.render()).toBe('[{"id":1}]');
  });

  it('renders null for a missing single variable', () => {
    expect(makeView({ viewVars: { _serialize: 'nothing' } }).render()).toBe('null');
  });

  it('falls back to template rendering without _serialize', () => {
    const view = makeView({ templatePath: 'Posts', viewVars: { title: 'Plain' } });

    expect(view.render('index', false)).toBe('<p>Plain</p>\n');
  });

  it('reports json as its content type', () => {
    expect(makeView({}).contentType).toBe('json');
  });
});
