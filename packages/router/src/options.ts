import { Logger } from '@patmux/logger';

import type { ResolvedRouterOptions, RouterOptions } from './interfaces';

export function resolveRouterOptions(options: RouterOptions = {}): ResolvedRouterOptions {
  return {
    keepContext: options.keepContext ?? false,
    skipClean: options.skipClean ?? false,
    caseSensitive: options.caseSensitive ?? true,
    notFoundHandler: options.notFoundHandler,
    maxParamLength: options.maxParamLength ?? Number.MAX_SAFE_INTEGER,
    logger: options.logger ?? new Logger('Router'),
  };
}
