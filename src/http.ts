import fetch, { type RequestInit, type Response } from 'node-fetch';

import type { ClientConfig } from './config.js';
import {
  InvalidDataError,
  NotFoundError,
  RequestError,
  ServerError,
  UnauthorizedError,
  UnknownApiError,
  UploadFailedError,
  describeError,
} from './errors.js';
import type { Logger } from './logger.js';

export const apiPaths = {
  signedUrl: '/api/files/aws-presigned',
  socialMedia: '/api/files/social',
  mediaResult: '/api/media/users',
  mediaResultPages: '/api/v2/media/users/pages',
} as const;

export type QueryParams = Record<string, string | number | undefined>;

/**
 * What the core needs from the network. `HttpClient` is the production
 * implementation; tests substitute their own.
 */
export interface Transport {
  get(path: string, query?: QueryParams, signal?: AbortSignal): Promise<unknown>;
  post(path: string, body: unknown, signal?: AbortSignal): Promise<unknown>;
  put(url: string, data: Buffer, contentType: string, signal?: AbortSignal): Promise<void>;
}

const USER_AGENT = 'media-authenticity-sdk/0.1.0';

export class HttpClient implements Transport {
  constructor(
    private readonly config: ClientConfig,
    private readonly logger?: Logger,
  ) {}

  async get(path: string, query: QueryParams = {}, signal?: AbortSignal): Promise<unknown> {
    const url = this.buildUrl(path, query);
    const response = await this.send(url, { method: 'GET', headers: this.apiHeaders() }, signal);
    return this.handleResponse(response);
  }

  async post(path: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    const url = this.buildUrl(path);
    const response = await this.send(
      url,
      {
        method: 'POST',
        headers: { ...this.apiHeaders(), 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      },
      signal,
    );
    return this.handleResponse(response);
  }

  // Presigned URLs carry their own credentials; the API key must not leak to storage.
  async put(url: string, data: Buffer, contentType: string, signal?: AbortSignal): Promise<void> {
    const response = await this.send(
      url,
      {
        method: 'PUT',
        headers: {
          'Content-Type': contentType,
          'Content-Length': String(data.length),
          'User-Agent': USER_AGENT,
        },
        body: data,
      },
      signal,
    );

    if (!response.ok) {
      const text = await this.readBody(response);
      throw new UploadFailedError(
        `Failed to upload to presigned URL. Status: ${response.status} Body: ${text}`,
        response.status,
      );
    }
  }

  private apiHeaders(): Record<string, string> {
    return {
      'X-API-KEY': this.config.apiKey,
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
    };
  }

  private buildUrl(path: string, query: QueryParams = {}): string {
    const url = new URL(`${this.config.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private async send(url: string, init: RequestInit, signal?: AbortSignal): Promise<Response> {
    signal?.throwIfAborted();

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    this.logger?.debug({ method: init.method, url }, 'sending request');
    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new RequestError(`Request to ${url} timed out after ${this.config.timeoutMs}ms`, error);
      }
      throw new RequestError(`Request to ${url} failed: ${describeError(error)}`, error);
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private async handleResponse(response: Response): Promise<unknown> {
    const text = await this.readBody(response);

    if (response.ok) {
      return text ? this.parseJson(text, response.url) : null;
    }

    switch (response.status) {
      case 401:
      case 403:
        throw new UnauthorizedError(response.status);
      case 404:
        throw new NotFoundError('Resource not found');
      default:
        if (response.status >= 500) {
          throw new ServerError(`Server error (HTTP ${response.status})`, response.status);
        }
        throw new UnknownApiError(
          extractErrorMessage(text) ?? `Unknown error (HTTP ${response.status})`,
          response.status,
        );
    }
  }

  private parseJson(text: string, url: string): unknown {
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new InvalidDataError(`Response from ${url} is not valid JSON`, error);
    }
  }

  private async readBody(response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (err) {
      return `<failed to read body: ${String(err)}>`;
    }
  }
}

function extractErrorMessage(text: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed && typeof parsed.error === 'string') {
      return parsed.error;
    }
  } catch {
    return undefined;
  }
  return undefined;
}
