import type { Logger } from 'pino';
import { z } from 'zod';

import { errorToString, fetchWithTimeout, rootLogger } from '@subnet-warp/utils';

import {
  MalformedResponseError,
  RemoteUnavailableError,
  RpcApplicationError,
} from '../errors.js';

import { JsonRpcEnvelopeSchema } from './schemas.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export type JsonRpcParams = Record<string, unknown> | unknown[];

export interface JsonRpcRequestOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface JsonRpcTransportOptions {
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * POSTs JSON-RPC 2.0 requests and validates both the envelope and the result.
 * Each call is a single attempt; retries are up to the caller.
 */
export class JsonRpcTransport {
  protected readonly logger: Logger;
  protected readonly timeoutMs: number;
  protected nextId = 1;

  constructor(options: JsonRpcTransportOptions = {}) {
    this.logger =
      options.logger ?? rootLogger.child({ module: 'JsonRpcTransport' });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async request<S extends z.ZodTypeAny>(
    url: string,
    method: string,
    params: JsonRpcParams | undefined,
    resultSchema: S,
    options: JsonRpcRequestOptions = {},
  ): Promise<z.output<S>> {
    const id = this.nextId++;
    this.logger.trace({ url, method, id }, 'Sending JSON-RPC request');

    let response: Response;
    try {
      response = await fetchWithTimeout(
        url,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ jsonrpc: '2.0', id, method, params }),
          signal: options.signal,
        },
        options.timeoutMs ?? this.timeoutMs,
      );
    } catch (error) {
      throw new RemoteUnavailableError(url, errorToString(error), error);
    }

    if (!response.ok) {
      throw new RemoteUnavailableError(
        url,
        `HTTP ${response.status} ${response.statusText}`.trim(),
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new MalformedResponseError(method, 'body is not JSON', error);
    }

    const envelope = JsonRpcEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new MalformedResponseError(
        method,
        `invalid JSON-RPC envelope: ${envelope.error.message}`,
        envelope.error,
      );
    }
    if (envelope.data.error) {
      const { code, message, data } = envelope.data.error;
      throw new RpcApplicationError(method, code, message, data);
    }

    const result = resultSchema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new MalformedResponseError(
        method,
        `unexpected result: ${result.error.message}`,
        result.error,
      );
    }
    this.logger.trace({ url, method, id }, 'Received JSON-RPC result');
    return result.data;
  }
}
