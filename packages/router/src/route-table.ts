import { METHODS } from 'node:http';

import FindMyWay from 'find-my-way';

import { WILDCARD_PARAM } from './constants';
import type { RouteMatch } from './interfaces';
import type { Route } from './route';
import type { RouteVariables } from './types';

type Anchor = FindMyWay.Handler<FindMyWay.HTTPVersion.V1>;

export interface RouteTableOptions {
  caseSensitive: boolean;
  maxParamLength: number;
}

export function isHttpMethod(method: string): method is FindMyWay.HTTPMethod {
  return METHODS.includes(method);
}

/**
 * Expands a pattern into the paths registered with find-my-way: the pattern itself and a
 * wildcard form that matches everything below it.
 */
export function expandPattern(pattern: string): string[] {
  if (pattern.endsWith('*')) {
    return [pattern];
  }

  return [pattern, pattern.endsWith('/') ? `${pattern}*` : `${pattern}/*`];
}

/**
 * Route storage and matching, delegated to find-my-way.
 *
 * Each registered path gets its own anchor handler; the anchor maps back to every route
 * registered under that path, earliest first. Precedence between different paths is
 * find-my-way's: static, then parametric, then wildcard.
 */
export class RouteTable {
  private readonly router: FindMyWay.Instance<FindMyWay.HTTPVersion.V1>;
  private readonly slots = new Map<Anchor, Route[]>();
  private readonly registered: Route[] = [];

  constructor(options: RouteTableOptions) {
    this.router = FindMyWay({
      caseSensitive: options.caseSensitive,
      ignoreTrailingSlash: false,
      ignoreDuplicateSlashes: false,
      maxParamLength: options.maxParamLength,
    });
  }

  /**
   * Register a route. Overlapping registrations are kept; the earliest one wins.
   * @param route - The route to register
   */
  register(route: Route) {
    const method = route.getMethod();

    for (const path of expandPattern(route.getPattern())) {
      const existing = this.router.findRoute(method, path);

      if (existing) {
        this.slots.get(existing.handler)?.push(route);
        continue;
      }

      const anchor: Anchor = () => undefined;

      this.slots.set(anchor, [route]);
      this.router.on(method, path, anchor);
    }

    this.registered.push(route);
  }

  /**
   * Find the route for a method and path
   * @param method - The HTTP method of the request
   * @param path - The canonical path of the request
   * @returns The route and its variables, or undefined when nothing matches
   */
  match(method: string, path: string): RouteMatch | undefined {
    if (!isHttpMethod(method)) {
      return undefined;
    }

    const found = this.router.find(method, path);

    if (!found) {
      return undefined;
    }

    const route = this.slots.get(found.handler)?.[0];

    if (!route) {
      return undefined;
    }

    const variables: RouteVariables = {};

    for (const [name, value] of Object.entries(found.params)) {
      if (name !== WILDCARD_PARAM && value !== undefined) {
        variables[name] = value;
      }
    }

    return { route, variables };
  }

  /**
   * Every registered route in registration order
   */
  routes(): readonly Route[] {
    return this.registered;
  }
}
