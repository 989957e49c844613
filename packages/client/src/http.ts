/**
 * HTTP executor backed by undici.
 */

import { Agent, type Dispatcher, fetch } from "undici";
import type { HttpExecutor, HttpRequest, HttpResponse } from "./types/transport.ts";

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

export type HttpClientOptions = {
  /**
   * Accept any server certificate, self-signed included. This disables
   * TLS certificate validation entirely and stays until servers present
   * certificates chaining to a root the CLI ships with.
   */
  allowSelfSignedCertificates: boolean;
  /** Applies when a request carries no `timeoutMs` */
  defaultTimeoutMs?: number;
  /** Replaces the connection pool; used by tests */
  dispatcher?: Dispatcher;
};

export type HttpClient = {
  execute: HttpExecutor;
  /** Close pooled connections */
  close: () => Promise<void>;
};

/**
 * Connection pool settings. Timeouts are enforced per request by an abort
 * signal, so the pool's own header/body timers are switched off.
 */
export const agentOptions = (allowSelfSignedCertificates: boolean): Agent.Options => ({
  headersTimeout: 0,
  bodyTimeout: 0,
  connect: { rejectUnauthorized: !allowSelfSignedCertificates },
});

/**
 * Create an HTTP client with one connection pool for the process.
 */
export const createHttpClient = (options: HttpClientOptions): HttpClient => {
  const { allowSelfSignedCertificates, defaultTimeoutMs = DEFAULT_HTTP_TIMEOUT_MS } = options;

  const dispatcher = options.dispatcher ?? new Agent(agentOptions(allowSelfSignedCertificates));

  const execute = async (request: HttpRequest): Promise<HttpResponse> => {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      dispatcher,
      signal: AbortSignal.timeout(request.timeoutMs ?? defaultTimeoutMs),
    });

    if (response.status !== 200) {
      // Only the status of a failed call is reported; its body is discarded
      await response.body?.cancel().catch(() => undefined);
      return { status: response.status, statusText: response.statusText, body: new Uint8Array() };
    }

    return {
      status: response.status,
      statusText: response.statusText,
      body: new Uint8Array(await response.arrayBuffer()),
    };
  };

  const close = async (): Promise<void> => {
    await dispatcher.close();
  };

  return { execute, close };
};
