import { getReasonPhrase, StatusCodes } from 'http-status-codes';

import { ContentType, HeaderField } from './constants';
import type { ContentTypeValue, ResponseBody } from './types';

function reasonPhrase(status: number): string {
  try {
    return getReasonPhrase(status);
  } catch {
    // http-status-codes throws for codes it does not list
    return '';
  }
}

export class RouterResponse {
  private readonly _headers = new Map<string, string>();
  private _body: ResponseBody | undefined;
  private _status: number | undefined;
  private _statusText: string | undefined;
  private _sent = false;

  /**
   * Status set by the handler, 200 when none was set.
   */
  getStatus(): number {
    return this._status ?? StatusCodes.OK;
  }

  getStatusText(): string {
    return this._statusText ?? reasonPhrase(this.getStatus());
  }

  setStatus(status: number, statusText?: string) {
    this._status = status;
    this._statusText = statusText ?? reasonPhrase(status);

    return this;
  }

  getHeader(name: string) {
    return this._headers.get(name.toLowerCase());
  }

  setHeader(name: string, value: string) {
    this._headers.set(name.toLowerCase(), value);

    return this;
  }

  appendHeader(name: string, value: string) {
    const existing = this.getHeader(name);

    if (existing) {
      this.setHeader(name, `${existing}, ${value}`);
    } else {
      this.setHeader(name, value);
    }

    return this;
  }

  removeHeader(name: string) {
    this._headers.delete(name.toLowerCase());

    return this;
  }

  /**
   * Headers with lower-cased names, in the order they were first set.
   */
  getHeaders(): Record<string, string> {
    return Object.fromEntries(this._headers);
  }

  getContentType() {
    return this.getHeader(HeaderField.ContentType);
  }

  setContentType(contentType: ContentTypeValue, charset?: string) {
    this.setHeader(HeaderField.ContentType, `${contentType}${charset ? `; charset=${charset}` : ''}`);

    return this;
  }

  getBody() {
    return this._body;
  }

  setBody(body: ResponseBody | undefined) {
    this._body = body;

    return this;
  }

  /**
   * Finish the response with a body, inferring the content type when none is set.
   * @param body - Text or bytes to send
   * @param status - Overrides the current status
   */
  send(body: ResponseBody, status?: number) {
    if (status !== undefined) {
      this.setStatus(status);
    }

    if (!this.getContentType()) {
      if (typeof body === 'string') {
        this.setContentType(ContentType.Text, 'utf-8');
      } else {
        this.setContentType(ContentType.OctetStream);
      }
    }

    this._body = body;
    this._sent = true;

    return this;
  }

  /**
   * Finish the response with a JSON document.
   */
  json(data: unknown, status?: number) {
    this.setContentType(ContentType.Json, 'utf-8');

    return this.send(JSON.stringify(data), status);
  }

  /**
   * Finish the response as a redirect with an empty body.
   * @param location - Value for the Location header
   * @param status - Redirect status
   */
  redirect(location: string, status: number = StatusCodes.MOVED_PERMANENTLY) {
    this.setHeader(HeaderField.Location, location);
    this.setStatus(status);
    this._body = undefined;
    this._sent = true;

    return this;
  }

  /**
   * Whether send, json or redirect has finished the response.
   */
  isSent() {
    return this._sent;
  }
}
