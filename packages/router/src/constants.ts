/**
 * HTTP Methods
 */
export const HttpMethod = {
  Get: 'GET',
  Post: 'POST',
  Put: 'PUT',
  Patch: 'PATCH',
  Delete: 'DELETE',
  Options: 'OPTIONS',
  Head: 'HEAD',
} as const;

export const ContentType = {
  Json: 'application/json',
  Text: 'text/plain',
  OctetStream: 'application/octet-stream',
} as const;

export const HeaderField = {
  Location: 'location',
  ContentType: 'content-type',
  RequestId: 'x-request-id',
} as const;

/**
 * Marks route variables injected into the query string, e.g. `:id=42`.
 */
export const VARIABLE_PREFIX = ':';

/**
 * Key find-my-way reports the remainder of a wildcard match under.
 */
export const WILDCARD_PARAM = '*';
