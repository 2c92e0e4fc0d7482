import { describe, it, expect } from 'vitest';

import { ClassRegistry, NameRegistry } from '../ClassRegistry';

describe('NameRegistry', () => {
  it('resolves bare names with and without a suffix', () => {
    const registry = new NameRegistry<string>('View').register('View', 'base').register('JsonView', 'json');

    expect(registry.resolve('View')).toBe('base');
    expect(registry.resolve('Json', 'View')).toBe('json');
    expect(registry.resolve('Xml', 'View')).toBeUndefined();
  });

  it('resolves plugin-qualified names', () => {
    const registry = new NameRegistry<string>('View').register('Blog.PostView', 'post');

    expect(registry.resolve('Blog.Post', 'View')).toBe('post');
    expect(registry.resolve('Post', 'View')).toBeUndefined();
    expect(registry.has('Blog.Post', 'View')).toBe(true);
  });

  it('lists registered names', () => {
    const registry = new NameRegistry<number>('Helper').register('HtmlHelper', 1).register('FormHelper', 2);

    expect(registry.names()).toEqual(['HtmlHelper', 'FormHelper']);
  });
});

describe('ClassRegistry', () => {
  it('keeps one registry per kind of class', () => {
    const classes = new ClassRegistry();

    expect(classes.views.type).toBe('View');
    expect(classes.controllers.type).toBe('Controller');
    expect(classes.helpers.type).toBe('Helper');
    expect(classes.components.type).toBe('Component');
  });
});
