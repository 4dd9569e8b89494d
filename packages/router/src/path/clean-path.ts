const SLASH_CODE = 47;

/**
 * Returns the canonical form of a request path.
 *
 * Repeated slashes and `.` segments are dropped and `..` removes the segment before it,
 * never climbing above the root. A trailing slash on the input survives cleaning unless
 * the result is the root itself. Percent-escapes are left untouched.
 *
 * @example
 * cleanPath('/a/../b');   // '/b'
 * cleanPath('a//b/./');   // '/a/b/'
 * cleanPath('');          // '/'
 */
export function cleanPath(path: string): string {
  if (!path) {
    return '/';
  }

  const rooted = path.charCodeAt(0) === SLASH_CODE ? path : '/' + path;
  const stack: string[] = [];

  for (const part of rooted.split('/')) {
    if (!part || part === '.') {
      continue;
    }

    if (part === '..') {
      stack.pop();
      continue;
    }

    stack.push(part);
  }

  const cleaned = '/' + stack.join('/');

  if (cleaned !== '/' && rooted.charCodeAt(rooted.length - 1) === SLASH_CODE) {
    return cleaned + '/';
  }

  return cleaned;
}
