import type { Logger } from 'winston';
import type { Server } from '../Server';
import {
  AuthenticationError,
  NetworkError,
  NotFoundError,
  ResponseParseError,
  ServerClientError,
  ServerErrorDetails,
  ServerResponseError,
  TimeoutError
} from '../../core/errors';
import { createLogger } from '../../core/logger';
import { RequestOptions } from '../../models/RequestOptions';
import { errorResponse } from '../../models/schemas';
import { withRetry } from '../../utils/retryUtils';
import { parseTsResponse } from '../../utils/xmlUtils';
import { HttpMethod } from '../../utils/types';

/**
 * A completed 2xx response
 */
export class ServerResponse {
  constructor(
    readonly status: number,
    readonly headers: Headers,
    readonly content: Buffer
  ) {}

  /** Body decoded as UTF-8 */
  get text(): string {
    return this.content.toString('utf8');
  }
}

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Reads the `<error>` element of a failed response. Bodies that are not
 * server XML yield no details.
 */
export function parseServerError(body: string): ServerErrorDetails {
  if (!body.trim()) return {};

  try {
    const { error } = parseTsResponse(body, errorResponse);
    return { code: error['@_code'], summary: error.summary, detail: error.detail };
  } catch (parseError) {
    if (parseError instanceof ResponseParseError) {
      return {};
    }
    throw parseError;
  }
}

/**
 * Base class of REST resource endpoints.
 *
 * Sends requests with the session token of the parent server, retries GETs
 * on transient failures and maps failed responses to client errors.
 */
export abstract class Endpoint {
  protected readonly log: Logger;

  constructor(protected readonly parentSrv: Server, component: string) {
    this.log = createLogger(component);
  }

  protected async getRequest(url: string, reqOptions?: RequestOptions): Promise<ServerResponse> {
    const target = reqOptions ? reqOptions.applyQueryParams(new URL(url)).toString() : url;
    const { maxRetries, baseDelay } = this.parentSrv.config.retry;

    return withRetry(() => this.makeRequest('GET', target), { maxRetries, baseDelay });
  }

  protected async deleteRequest(url: string): Promise<ServerResponse> {
    return this.makeRequest('DELETE', url);
  }

  protected async putRequest(
    url: string,
    body: string | Buffer,
    contentType: string = 'text/xml'
  ): Promise<ServerResponse> {
    return this.makeRequest('PUT', url, body, contentType);
  }

  protected async postRequest(
    url: string,
    body: string | Buffer,
    contentType: string = 'text/xml'
  ): Promise<ServerResponse> {
    return this.makeRequest('POST', url, body, contentType);
  }

  private async makeRequest(
    method: HttpMethod,
    url: string,
    body?: string | Buffer,
    contentType?: string
  ): Promise<ServerResponse> {
    const { authHeaderName, timeout } = this.parentSrv.config;
    const headers = new Headers();

    const token = this.parentSrv.authToken;
    if (token) {
      headers.set(authHeaderName, token);
    }
    if (body !== undefined && contentType) {
      headers.set('Content-Type', contentType);
    }

    this.log.debug(`${method} ${url}`, { method, url });

    let response: Response;
    let content: Buffer;
    try {
      response = await fetch(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(timeout)
      });
      content = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (isAbortError(error)) {
        throw new TimeoutError(`Request timed out after ${timeout}ms`, url, method, timeout);
      }
      if (error instanceof ServerClientError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Request failed: ${message}`, url, method);
    }

    if (!response.ok) {
      throw this.toError(response, content.toString('utf8'), url, method);
    }

    this.log.debug(`${method} ${url} ${response.status}`, { method, url, status: response.status });
    return new ServerResponse(response.status, response.headers, content);
  }

  private toError(response: Response, body: string, url: string, method: HttpMethod): ServerClientError {
    const details = parseServerError(body);
    const reason = details.summary
      ? `${details.summary}${details.detail ? `: ${details.detail}` : ''}`
      : response.statusText;
    const context = { url, method, ...details };

    switch (response.status) {
      case 401:
        return new AuthenticationError(`Authentication failed: ${reason}`, 'token', 401, context);
      case 403:
        return new AuthenticationError(`Access forbidden: ${reason}`, 'token', 403, context);
      case 404:
        return new NotFoundError(`Resource not found: ${reason}`, 'url', url, 404, context);
      default:
        return new ServerResponseError(
          `HTTP error ${response.status}: ${reason}`,
          response.status,
          details,
          { url, method }
        );
    }
  }
}
