import { describe, expect, it } from 'vitest';

import type { RouteNameRegistry } from './interfaces';
import { Route } from './route';
import { expandPattern, isHttpMethod, RouteTable } from './route-table';

const registry: RouteNameRegistry = { claimName: () => undefined };

function createRoute(method: 'GET' | 'POST' | 'DELETE', pattern: string) {
  return new Route(method, pattern, () => undefined, registry);
}

describe('expandPattern', () => {
  it('should add a wildcard child below a plain pattern', () => {
    expect(expandPattern('/items/:id')).toEqual(['/items/:id', '/items/:id/*']);
  });

  it('should append the wildcard directly after a trailing slash', () => {
    expect(expandPattern('/static/')).toEqual(['/static/', '/static/*']);
    expect(expandPattern('/')).toEqual(['/', '/*']);
  });

  it('should leave wildcard patterns alone', () => {
    expect(expandPattern('/files/*')).toEqual(['/files/*']);
  });
});

describe('isHttpMethod', () => {
  it('should accept methods node knows and reject others', () => {
    expect(isHttpMethod('PATCH')).toBe(true);
    expect(isHttpMethod('BREW')).toBe(false);
  });
});

describe('RouteTable', () => {
  it('should match a pattern and extract its variables', () => {
    const table = new RouteTable({ caseSensitive: true, maxParamLength: 500 });
    const route = createRoute('GET', '/items/:id');

    table.register(route);

    expect(table.match('GET', '/items/42')).toEqual({ route, variables: { id: '42' } });
  });

  it('should match paths below a pattern without exposing the remainder', () => {
    const table = new RouteTable({ caseSensitive: true, maxParamLength: 500 });
    const route = createRoute('GET', '/items/:id');

    table.register(route);

    expect(table.match('GET', '/items/42/comments/7')).toEqual({ route, variables: { id: '42' } });
  });

  it('should treat the root pattern as a catch-all', () => {
    const table = new RouteTable({ caseSensitive: true, maxParamLength: 500 });
    const route = createRoute('GET', '/');

    table.register(route);

    expect(table.match('GET', '/')?.route).toBe(route);
    expect(table.match('GET', '/anything/at/all')?.route).toBe(route);
  });

  it('should only match the registered method', () => {
    const table = new RouteTable({ caseSensitive: true, maxParamLength: 500 });

    table.register(createRoute('POST', '/x'));

    expect(table.match('GET', '/x')).toBeUndefined();
    expect(table.match('BREW', '/x')).toBeUndefined();
  });

  it('should prefer a static route over a parametric one', () => {
    const table = new RouteTable({ caseSensitive: true, maxParamLength: 500 });
    const byId = createRoute('GET', '/items/:id');
    const latest = createRoute('GET', '/items/latest');

    table.register(byId);
    table.register(latest);

    expect(table.match('GET', '/items/latest')?.route).toBe(latest);
    expect(table.match('GET', '/items/9')?.route).toBe(byId);
  });

  it('should keep earlier registrations for the same pattern and let them win', () => {
    const table = new RouteTable({ caseSensitive: true, maxParamLength: 500 });
    const first = createRoute('GET', '/dup');
    const second = createRoute('GET', '/dup');

    table.register(first);
    table.register(second);

    expect(table.match('GET', '/dup')?.route).toBe(first);
    expect(table.routes()).toEqual([first, second]);
  });

  it('should honour case-insensitive matching when configured', () => {
    const table = new RouteTable({ caseSensitive: false, maxParamLength: 500 });
    const route = createRoute('GET', '/About');

    table.register(route);

    expect(table.match('GET', '/about')?.route).toBe(route);
  });

  it('should match case-sensitively by default configuration', () => {
    const table = new RouteTable({ caseSensitive: true, maxParamLength: 500 });

    table.register(createRoute('GET', '/About'));

    expect(table.match('GET', '/about')).toBeUndefined();
  });

  it('should stop matching variables longer than the configured limit', () => {
    const table = new RouteTable({ caseSensitive: true, maxParamLength: 500 });
    const route = createRoute('GET', '/items/:id');

    table.register(route);

    expect(table.match('GET', `/items/${'x'.repeat(400)}`)?.variables).toEqual({ id: 'x'.repeat(400) });
    expect(table.match('GET', `/items/${'x'.repeat(600)}`)).toBeUndefined();
  });
});
