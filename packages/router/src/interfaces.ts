import type { Logger } from '@patmux/logger';

import type { RequestContext } from './context/request-context';
import type { Route } from './route';
import type { RequestHeaders, RouteHandler, RouteVariables } from './types';

export interface RouterRequestInit {
  method: string;
  /**
   * Request target: path plus optional `?query`, exactly as received.
   */
  url: string;
  headers?: RequestHeaders;
  context?: RequestContext;
}

export interface RouterOptions {
  /**
   * Keep the request context populated after dispatch instead of clearing it.
   * @default false
   */
  keepContext?: boolean;
  /**
   * Match the raw path without redirecting to its canonical form.
   * @default false
   */
  skipClean?: boolean;
  /**
   * @default true
   */
  caseSensitive?: boolean;
  /**
   * Handler for requests no route matches. Falls back to a plain 404 on first use.
   */
  notFoundHandler?: RouteHandler;
  /**
   * Longest value a single path variable may capture before the route stops matching.
   * @default Number.MAX_SAFE_INTEGER
   */
  maxParamLength?: number;
  logger?: Logger;
}

export interface ResolvedRouterOptions {
  keepContext: boolean;
  skipClean: boolean;
  caseSensitive: boolean;
  notFoundHandler: RouteHandler | undefined;
  maxParamLength: number;
  logger: Logger;
}

export interface RouteMatch {
  route: Route;
  variables: RouteVariables;
}

export interface RouteNameRegistry {
  claimName(name: string, route: Route): void;
}

/**
 * The part of node's IncomingMessage the request listener reads.
 */
export interface NodeRequestSource {
  method?: string;
  url?: string;
  headers: RequestHeaders;
}

/**
 * The part of node's ServerResponse the request listener writes.
 */
export interface NodeResponseTarget {
  statusCode: number;
  statusMessage: string;
  readonly headersSent: boolean;
  setHeader(name: string, value: string): unknown;
  getHeaderNames(): string[];
  removeHeader(name: string): void;
  end(chunk?: string | Uint8Array): unknown;
  destroy(): unknown;
}
