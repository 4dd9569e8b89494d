import qs from 'qs';

import { VARIABLE_PREFIX } from './constants';
import { RequestContext } from './context/request-context';
import type { RouterRequestInit } from './interfaces';
import type { RequestHeaders } from './types';

export class RouterRequest {
  readonly method: string;
  readonly path: string;
  readonly headers: RequestHeaders;
  readonly context: RequestContext;

  private _rawQuery: string;
  private _query: qs.ParsedQs | undefined;

  constructor(init: RouterRequestInit) {
    this.method = init.method.toUpperCase();
    this.headers = normalizeHeaders(init.headers ?? {});
    this.context = init.context ?? new RequestContext();

    // Path stays raw; dot segments reach the canonicalizer untouched.
    const queryIndex = init.url.indexOf('?');

    if (queryIndex === -1) {
      this.path = init.url;
      this._rawQuery = '';
    } else {
      this.path = init.url.slice(0, queryIndex);
      this._rawQuery = init.url.slice(queryIndex + 1);
    }
  }

  /**
   * Get the request target as path plus raw query
   * @returns The URL of the request
   */
  get url() {
    return this._rawQuery ? `${this.path}?${this._rawQuery}` : this.path;
  }

  /**
   * Get the raw, still-escaped query string without the leading `?`
   * @returns The raw query string
   */
  get rawQuery() {
    return this._rawQuery;
  }

  /**
   * Get the parsed query of the request
   * @returns The query, including any route variables injected under the `:` prefix
   */
  get query(): qs.ParsedQs {
    if (!this._query) {
      // Route variables are appended last and must never fall past a parameter cap.
      this._query = qs.parse(this._rawQuery, { parameterLimit: Infinity });
    }

    return this._query;
  }

  /**
   * Replace the raw query string
   * @param rawQuery - The new raw query string
   * @returns The request instance
   */
  setRawQuery(rawQuery: string) {
    this._rawQuery = rawQuery;
    this._query = undefined;

    return this;
  }

  /**
   * Read a single query value. Repeated keys yield their first string value.
   * @param name - The query key
   * @returns The value, or undefined when absent or not a plain string
   */
  queryValue(name: string): string | undefined {
    const value = this.query[name];

    if (typeof value === 'string') {
      return value;
    }

    if (Array.isArray(value)) {
      const first = value[0];

      return typeof first === 'string' ? first : undefined;
    }

    return undefined;
  }

  /**
   * Read a variable captured from the route pattern. The router appends its pairs after the
   * client's query, so when the key repeats the last value is the captured one.
   * @param name - The variable name as written in the pattern, without the `:`
   */
  routeVar(name: string): string | undefined {
    const value = this.query[VARIABLE_PREFIX + name];

    if (Array.isArray(value)) {
      const last = value[value.length - 1];

      return typeof last === 'string' ? last : undefined;
    }

    return typeof value === 'string' ? value : undefined;
  }

  /**
   * Read a request header. Repeated headers are joined with `, `.
   * @param name - The header name, matched case-insensitively
   */
  header(name: string): string | undefined {
    const value = this.headers[name.toLowerCase()];

    return Array.isArray(value) ? value.join(', ') : value;
  }
}

function normalizeHeaders(headers: RequestHeaders): RequestHeaders {
  const normalized: RequestHeaders = {};

  for (const [name, value] of Object.entries(headers)) {
    normalized[name.toLowerCase()] = value;
  }

  return normalized;
}
