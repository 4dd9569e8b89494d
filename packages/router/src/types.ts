import type { RequestContext } from './context/request-context';
import type { ContentType } from './constants';
import type { RouterRequest } from './request';
import type { RouterResponse } from './response';

export type ContentTypeValue = (typeof ContentType)[keyof typeof ContentType];

export type RouteHandler = (req: RouterRequest, res: RouterResponse, ctx: RequestContext) => void | Promise<void>;

export type RouteVariables = Record<string, string>;

export type ResponseBody = string | Uint8Array;

export type RequestHeaders = Record<string, string | string[] | undefined>;
