/**
 * Authenticated request builder.
 */

import { signRequest } from "./auth/sign.ts";
import type { AuthSettings, HttpRequest } from "./types/transport.ts";

export const INSTALL_ID_COOKIE = "NSTACKINSTANCEID";

export type BuildRequestParams = {
  /** Server base URL ending in `/` */
  baseUrl: string;
  callName: string;
  body: Uint8Array;
  auth: AuthSettings;
  installId?: string;
  timeoutMs?: number;
  now: Date;
};

/**
 * Build a signed POST request for one call.
 */
export const buildRequest = (params: BuildRequestParams): HttpRequest => {
  const { baseUrl, callName, body, auth, installId, timeoutMs, now } = params;

  const headers: Record<string, string> = {
    "Content-Type": "application/octet-stream",
  };

  if (installId) {
    headers.Cookie = `${INSTALL_ID_COOKIE}=${installId}`;
  }

  const request: HttpRequest = {
    method: "POST",
    url: `${baseUrl}${callName}`,
    headers,
    body,
  };
  if (timeoutMs !== undefined) {
    request.timeoutMs = timeoutMs;
  }

  return signRequest(request, auth, now);
};
