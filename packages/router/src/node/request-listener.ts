import { randomUUID } from 'node:crypto';

import { LogContext, Logger } from '@patmux/logger';
import { getReasonPhrase, StatusCodes } from 'http-status-codes';

import { ContentType, HeaderField } from '../constants';
import type { NodeRequestSource, NodeResponseTarget } from '../interfaces';
import { RouterRequest } from '../request';
import { RouterResponse } from '../response';
import type { Router } from '../router';

export function toRouterRequest(source: NodeRequestSource): RouterRequest {
  return new RouterRequest({
    method: source.method ?? 'GET',
    url: source.url ?? '/',
    headers: source.headers,
  });
}

/**
 * Copy a finished RouterResponse onto a node response and end it.
 */
export function writeResponse(response: RouterResponse, target: NodeResponseTarget) {
  target.statusCode = response.getStatus();
  target.statusMessage = response.getStatusText();

  for (const [name, value] of Object.entries(response.getHeaders())) {
    target.setHeader(name, value);
  }

  const body = response.getBody();

  if (body === undefined) {
    target.end();
  } else {
    target.end(body);
  }
}

/**
 * Build a node:http request listener around a router.
 *
 * Each request runs in its own log scope keyed by `x-request-id` (or a fresh UUID).
 * A failure while dispatching or writing is logged and answered with 500; when headers
 * already went out the response is destroyed instead.
 *
 * @example
 * ```typescript
 * createServer(createRequestListener(router)).listen(3000);
 * ```
 */
export function createRequestListener(router: Router, logger: Pick<Logger, 'error'> = new Logger('RequestListener')) {
  return (source: NodeRequestSource, target: NodeResponseTarget): Promise<void> => {
    const req = toRouterRequest(source);
    const res = new RouterResponse();
    const reqId = req.header(HeaderField.RequestId) ?? randomUUID();

    return LogContext.run(reqId, async () => {
      try {
        await router.dispatch(req, res);
        writeResponse(res, target);
      } catch (e) {
        const err = e instanceof Error ? e : new Error(String(e));

        logger.error('Request failed', { method: req.method, path: req.path }, err);

        if (target.headersSent) {
          target.destroy();

          return;
        }

        // Drop whatever the failed write left behind.
        for (const name of target.getHeaderNames()) {
          target.removeHeader(name);
        }

        const failure = new RouterResponse()
          .setStatus(StatusCodes.INTERNAL_SERVER_ERROR)
          .setContentType(ContentType.Text, 'utf-8')
          .setBody(getReasonPhrase(StatusCodes.INTERNAL_SERVER_ERROR));

        writeResponse(failure, target);
      }
    });
  };
}
