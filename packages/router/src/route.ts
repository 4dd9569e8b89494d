import type FindMyWay from 'find-my-way';

import { RouterError } from './errors';
import type { RouteNameRegistry } from './interfaces';
import type { RouteHandler } from './types';

// `::` (an escaped literal colon), or `:name` optionally followed by a find-my-way regexp
// such as `:id(^\\d+)`
const PARAM_PATTERN = /::|:(\w+)(?:\([^)]*\))?/g;

/**
 * A registered (method, pattern, handler) entry. Returned by every registration call so
 * the caller can name it or build URLs from it.
 */
export class Route {
  private name: string | undefined;

  constructor(
    private readonly method: FindMyWay.HTTPMethod,
    private readonly pattern: string,
    private readonly handler: RouteHandler,
    private readonly registry: RouteNameRegistry,
  ) {}

  getMethod() {
    return this.method;
  }

  getPattern() {
    return this.pattern;
  }

  getHandler() {
    return this.handler;
  }

  getName() {
    return this.name;
  }

  /**
   * Name the route so it can be looked up and reversed through the router.
   * @param name - Unique within the router
   * @returns The route instance
   */
  setName(name: string) {
    if (this.name !== undefined) {
      throw new RouterError(`Route ${this.method} ${this.pattern} is already named "${this.name}"`);
    }

    this.registry.claimName(name, this);
    this.name = name;

    return this;
  }

  /**
   * Build a path from the pattern by filling in its variables.
   * @param params - Variable values, escaped with encodeURIComponent
   * @returns The path
   */
  url(params: Record<string, string> = {}): string {
    return this.pattern.replace(PARAM_PATTERN, (_segment: string, name: string | undefined) => {
      if (name === undefined) {
        return ':';
      }

      const value = params[name];

      if (value === undefined) {
        throw new RouterError(`Missing value for "${name}" building ${this.pattern}`);
      }

      return encodeURIComponent(value);
    });
  }
}
