/**
 * Transport: one signed HTTP round trip per call, every outcome folded
 * into a Result.
 *
 * `call` never rejects. Missing credentials, encoding problems, transport
 * faults and undecodable responses become client errors; non-200 statuses
 * and failures reported in the response body become server errors.
 */

import { type Codec, decode, either, encode, text } from "@nstack/codec";
import type { ApiCall, ServerReturn } from "@nstack/protocol";
import { buildRequest } from "./request.ts";
import { clientError, type Result, serverError, success } from "./result.ts";
import type { Credentials, HttpExecutor, HttpResponse } from "./types/transport.ts";
import { describeError } from "./utils/errors.ts";

/** Remote builds can run for a long time */
export const CALL_TIMEOUT_MS = 15 * 60 * 1000;

export const MISSING_CREDENTIALS_MESSAGE =
  "Missing or invalid credentials. Please run the 'set-server' configuration command.";

export type TransportConfig = {
  /** Server base URL ending in `/` */
  baseUrl: string;
  credentials: Credentials;
  http: HttpExecutor;
  /** Clock used for request signatures */
  clock?: () => Date;
  /** Receives one line per call with timing details */
  debug?: (message: string) => void;
};

export type Transport = {
  call: <A, B>(call: ApiCall<A, B>, arg: A) => Promise<Result<B>>;
};

const describeStatus = (response: HttpResponse): string =>
  response.statusText ? `${response.status} ${response.statusText}` : String(response.status);

export const createTransport = (config: TransportConfig): Transport => {
  const { baseUrl, credentials, http, clock = () => new Date(), debug } = config;

  const call = async <A, B>(apiCall: ApiCall<A, B>, arg: A): Promise<Result<B>> => {
    const { auth, installId } = credentials;
    if (!auth) {
      return clientError(MISSING_CREDENTIALS_MESSAGE);
    }

    let body: Uint8Array;
    try {
      body = encode(apiCall.args, arg);
    } catch (err) {
      return clientError(`Cannot encode argument: ${describeError(err)}`);
    }

    const startedAt = Date.now();
    let response: HttpResponse;
    try {
      const request = buildRequest({
        baseUrl,
        callName: apiCall.name,
        body,
        auth,
        installId,
        timeoutMs: CALL_TIMEOUT_MS,
        now: clock(),
      });
      debug?.(`POST ${request.url} (${body.length} bytes)`);
      response = await http(request);
    } catch (err) {
      return clientError(`Exception sending HTTP request: ${describeError(err)}`);
    }
    debug?.(
      `${apiCall.name} -> ${describeStatus(response)} in ${Date.now() - startedAt}ms (${response.body.length} bytes)`
    );

    if (response.status !== 200) {
      return serverError(describeStatus(response));
    }

    const reply: Codec<ServerReturn<B>> = either(text, apiCall.returns);
    const decoded = decode(reply, response.body);
    if (!decoded.ok) {
      return clientError(`Cannot decode return value: ${decoded.error}`);
    }
    return decoded.value.tag === "left"
      ? serverError(decoded.value.value)
      : success(decoded.value.value);
  };

  return { call };
};
