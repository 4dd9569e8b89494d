import { describe, expect, it } from 'vitest';

import { RequestContext } from './context/request-context';
import { RouterRequest } from './request';

describe('RouterRequest', () => {
  it('should split the target into raw path and query', () => {
    const req = new RouterRequest({ method: 'get', url: '/a/../b?x=1&y=2' });

    expect(req.method).toBe('GET');
    expect(req.path).toBe('/a/../b');
    expect(req.rawQuery).toBe('x=1&y=2');
    expect(req.url).toBe('/a/../b?x=1&y=2');
  });

  it('should treat a target without "?" as a bare path', () => {
    const req = new RouterRequest({ method: 'GET', url: '/plain' });

    expect(req.path).toBe('/plain');
    expect(req.rawQuery).toBe('');
    expect(req.query).toEqual({});
  });

  it('should keep only the first "?" as the separator', () => {
    const req = new RouterRequest({ method: 'GET', url: '/s?q=what?' });

    expect(req.path).toBe('/s');
    expect(req.queryValue('q')).toBe('what?');
  });

  it('should read the first of repeated query values', () => {
    const req = new RouterRequest({ method: 'GET', url: '/s?tag=a&tag=b' });

    expect(req.queryValue('tag')).toBe('a');
    expect(req.queryValue('missing')).toBeUndefined();
  });

  it('should read the last of repeated route variables', () => {
    const req = new RouterRequest({ method: 'GET', url: '/s?%3Aid=7&%3Aid=42' });

    expect(req.routeVar('id')).toBe('42');
    expect(req.queryValue(':id')).toBe('7');
    expect(req.routeVar('missing')).toBeUndefined();
  });

  it('should parse more than a thousand query pairs', () => {
    const pairs = Array.from({ length: 1200 }, (_, i) => `k${i}=${i}`).join('&');
    const req = new RouterRequest({ method: 'GET', url: `/s?${pairs}` });

    expect(req.queryValue('k1199')).toBe('1199');
  });

  it('should reparse the query after it is replaced', () => {
    const req = new RouterRequest({ method: 'GET', url: '/s?a=1' });

    expect(req.queryValue('a')).toBe('1');

    req.setRawQuery('a=2');

    expect(req.queryValue('a')).toBe('2');
  });

  it('should read headers case-insensitively', () => {
    const req = new RouterRequest({
      method: 'GET',
      url: '/',
      headers: { 'X-Request-Id': 'abc', accept: ['text/html', 'application/json'] },
    });

    expect(req.header('x-request-id')).toBe('abc');
    expect(req.header('Accept')).toBe('text/html, application/json');
    expect(req.header('cookie')).toBeUndefined();
  });

  it('should create a fresh context unless one is given', () => {
    const context = new RequestContext().set('user', 'test-user');

    expect(new RouterRequest({ method: 'GET', url: '/' }).context.size).toBe(0);
    expect(new RouterRequest({ method: 'GET', url: '/', context }).context.get<string>('user')).toBe('test-user');
  });
});
