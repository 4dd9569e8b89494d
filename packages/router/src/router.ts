import type { Logger } from '@patmux/logger';
import type FindMyWay from 'find-my-way';
import { getReasonPhrase, StatusCodes } from 'http-status-codes';

import { HttpMethod } from './constants';
import { RouterError } from './errors';
import type { RouteNameRegistry, RouterOptions } from './interfaces';
import { resolveRouterOptions } from './options';
import { cleanPath } from './path/clean-path';
import type { RouterRequest } from './request';
import type { RouterResponse } from './response';
import { Route } from './route';
import { RouteTable } from './route-table';
import type { RouteHandler } from './types';
import { propagateVariables } from './variables';

/**
 * Answers with a plain-text 404.
 */
export const defaultNotFoundHandler: RouteHandler = (_req, res) => {
  res.send(getReasonPhrase(StatusCodes.NOT_FOUND), StatusCodes.NOT_FOUND);
};

/**
 * Method-routing layer over a find-my-way route table.
 *
 * @example
 * ```typescript
 * const router = createRouter();
 *
 * router.get('/items/:id', (req, res) => {
 *   res.json({ id: req.routeVar('id') });
 * });
 *
 * await router.dispatch(new RouterRequest({ method: 'GET', url: '/items/42' }), new RouterResponse());
 * ```
 */
export class Router implements RouteNameRegistry {
  private readonly table: RouteTable;
  private readonly named = new Map<string, Route>();
  private readonly logger: Logger;
  private readonly keepContext: boolean;
  private readonly skipClean: boolean;
  private _notFoundHandler: RouteHandler | undefined;

  constructor(options?: RouterOptions) {
    const resolved = resolveRouterOptions(options);

    this.table = new RouteTable({ caseSensitive: resolved.caseSensitive, maxParamLength: resolved.maxParamLength });
    this.logger = resolved.logger;
    this.keepContext = resolved.keepContext;
    this.skipClean = resolved.skipClean;
    this._notFoundHandler = resolved.notFoundHandler;
  }

  /**
   * Handler used when no route matches. Reading it before one is set installs the default 404.
   */
  get notFoundHandler(): RouteHandler {
    if (!this._notFoundHandler) {
      this._notFoundHandler = defaultNotFoundHandler;
    }

    return this._notFoundHandler;
  }

  set notFoundHandler(handler: RouteHandler) {
    this._notFoundHandler = handler;
  }

  /* -------------------------------------------------------------------------- */
  /*                                Registration                                */
  /* -------------------------------------------------------------------------- */

  /**
   * Register a pattern with a handler for the given request method.
   * @param method - The HTTP method
   * @param pattern - A find-my-way path; it also matches every path below it
   * @param handler - The route handler
   * @returns The route, for further configuration
   */
  add(method: FindMyWay.HTTPMethod, pattern: string, handler: RouteHandler): Route {
    if (!pattern.startsWith('/')) {
      throw new RouterError(`Route pattern must start with "/": ${pattern}`);
    }

    const route = new Route(method, pattern, handler, this);

    this.table.register(route);
    this.logger.debug('Route registered', { method, pattern });

    return route;
  }

  options(pattern: string, handler: RouteHandler) {
    return this.add(HttpMethod.Options, pattern, handler);
  }

  delete(pattern: string, handler: RouteHandler) {
    return this.add(HttpMethod.Delete, pattern, handler);
  }

  head(pattern: string, handler: RouteHandler) {
    return this.add(HttpMethod.Head, pattern, handler);
  }

  get(pattern: string, handler: RouteHandler) {
    return this.add(HttpMethod.Get, pattern, handler);
  }

  post(pattern: string, handler: RouteHandler) {
    return this.add(HttpMethod.Post, pattern, handler);
  }

  put(pattern: string, handler: RouteHandler) {
    return this.add(HttpMethod.Put, pattern, handler);
  }

  patch(pattern: string, handler: RouteHandler) {
    return this.add(HttpMethod.Patch, pattern, handler);
  }

  /* -------------------------------------------------------------------------- */
  /*                                Named Routes                                */
  /* -------------------------------------------------------------------------- */

  claimName(name: string, route: Route) {
    if (this.named.has(name)) {
      throw new RouterError(`Route name already in use: ${name}`);
    }

    this.named.set(name, route);
  }

  getRoute(name: string): Route | undefined {
    return this.named.get(name);
  }

  /**
   * Build the path of a named route
   * @param name - The route name
   * @param params - Values for the pattern's variables
   */
  url(name: string, params?: Record<string, string>): string {
    const route = this.named.get(name);

    if (!route) {
      throw new RouterError(`Unknown route name: ${name}`);
    }

    return route.url(params);
  }

  /**
   * Every registered route in registration order
   */
  routes(): readonly Route[] {
    return this.table.routes();
  }

  /* -------------------------------------------------------------------------- */
  /*                                  Dispatch                                  */
  /* -------------------------------------------------------------------------- */

  /**
   * Dispatch a request to the handler of the matched route, or to the not-found handler.
   *
   * A non-canonical path is answered with a 301 to its canonical form and no handler runs.
   * Errors thrown by the handler reject the returned promise unchanged.
   * @param req - The request; route variables are appended to its query
   * @param res - The response sink
   */
  async dispatch(req: RouterRequest, res: RouterResponse): Promise<void> {
    if (!this.skipClean) {
      const canonical = cleanPath(req.path);

      if (canonical !== req.path) {
        this.logger.debug('Redirecting to canonical path', { from: req.path, to: canonical });
        res.redirect(canonical, StatusCodes.MOVED_PERMANENTLY);

        return;
      }
    }

    let handler: RouteHandler | undefined;
    const match = this.table.match(req.method, req.path);

    if (match) {
      handler = match.route.getHandler();
      propagateVariables(req, match.variables);
    }

    if (!handler) {
      this.logger.debug('No route matched', { method: req.method, path: req.path });
      handler = this.notFoundHandler;
    }

    try {
      await handler(req, res, req.context);
    } finally {
      if (!this.keepContext) {
        req.context.clear();
      }
    }
  }
}

/**
 * Create an empty router: no routes and no not-found handler set.
 */
export function createRouter(options?: RouterOptions): Router {
  return new Router(options);
}
