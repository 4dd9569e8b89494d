import qs from 'qs';

import { VARIABLE_PREFIX } from './constants';
import type { RouterRequest } from './request';
import type { RouteVariables } from './types';

/**
 * Appends route variables to the request's raw query as `:name=value` pairs so handlers
 * read them the same way as ordinary query parameters.
 *
 * Keys and values are percent-escaped (RFC 3986, so a space becomes `%20`). Existing query
 * content is kept and joined with `&`. The order of the injected pairs is not guaranteed.
 */
export function propagateVariables(req: RouterRequest, variables: RouteVariables): void {
  const prefixed: Record<string, string> = {};
  let count = 0;

  for (const [name, value] of Object.entries(variables)) {
    prefixed[VARIABLE_PREFIX + name] = value;
    count++;
  }

  if (count === 0) {
    return;
  }

  const injected = qs.stringify(prefixed);

  req.setRawQuery(req.rawQuery ? `${req.rawQuery}&${injected}` : injected);
}
