import { describe, expect, it } from 'vitest';

import { cleanPath } from './clean-path';

describe('cleanPath', () => {
  it('should map the empty path to the root', () => {
    expect(cleanPath('')).toBe('/');
  });

  it('should prepend a missing leading slash', () => {
    expect(cleanPath('users')).toBe('/users');
    expect(cleanPath('users/42/')).toBe('/users/42/');
  });

  it('should resolve dot segments', () => {
    expect(cleanPath('/a/../b')).toBe('/b');
    expect(cleanPath('/a/./b')).toBe('/a/b');
    expect(cleanPath('/a/b/c/../../d')).toBe('/a/d');
  });

  it('should not climb above the root', () => {
    expect(cleanPath('/..')).toBe('/');
    expect(cleanPath('/../../x')).toBe('/x');
  });

  it('should collapse repeated slashes', () => {
    expect(cleanPath('//a///b')).toBe('/a/b');
    expect(cleanPath('///')).toBe('/');
  });

  it('should keep a meaningful trailing slash', () => {
    expect(cleanPath('/a/b/')).toBe('/a/b/');
    expect(cleanPath('/a/./')).toBe('/a/');
    expect(cleanPath('/a//')).toBe('/a/');
  });

  it('should not add a trailing slash when cleaning reaches the root', () => {
    expect(cleanPath('/a/../')).toBe('/');
    expect(cleanPath('/./')).toBe('/');
  });

  it('should leave percent-escapes alone', () => {
    expect(cleanPath('/a/%2E%2E/b')).toBe('/a/%2E%2E/b');
    expect(cleanPath('/files/a%2Fb')).toBe('/files/a%2Fb');
  });

  it('should return canonical paths unchanged', () => {
    for (const path of ['/', '/a', '/a/b/', '/items/42', '/a.b/c..d']) {
      expect(cleanPath(path)).toBe(path);
    }
  });

  it('should be idempotent', () => {
    for (const path of ['', 'x/../y/', '//a/./b/..', '/a/b/../../..', '/q/./']) {
      const once = cleanPath(path);

      expect(cleanPath(once)).toBe(once);
    }
  });
});
