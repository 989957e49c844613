/**
 * HMAC request signing.
 *
 * The signature covers the method, URL path, date header and a SHA-256
 * digest of the body:
 *
 *   POST\n/<CallName>\n<X-NStack-Date>\n<hex sha256(body)>
 *
 * keyed with the UTF-8 bytes of the user's secret key.
 */

import { hmac } from "@noble/hashes/hmac";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import type { AuthSettings, HttpRequest } from "../types/transport.ts";

export const USER_HEADER = "X-NStack-User";
export const DATE_HEADER = "X-NStack-Date";
export const SIGNATURE_HEADER = "X-NStack-Signature";

/**
 * Build the string-to-sign for a request.
 */
export const canonicalRequest = (request: HttpRequest, date: string): string =>
  [request.method, new URL(request.url).pathname, date, bytesToHex(sha256(request.body))].join(
    "\n"
  );

/**
 * Compute the hex signature of a request.
 */
export const computeSignature = (request: HttpRequest, date: string, secretKey: string): string =>
  bytesToHex(hmac(sha256, utf8ToBytes(secretKey), utf8ToBytes(canonicalRequest(request, date))));

/**
 * Return a copy of the request carrying the signature headers.
 * Must run after every other change to the request.
 */
export const signRequest = (request: HttpRequest, auth: AuthSettings, now: Date): HttpRequest => {
  const date = now.toISOString();
  return {
    ...request,
    headers: {
      ...request.headers,
      [USER_HEADER]: auth.userId,
      [DATE_HEADER]: date,
      [SIGNATURE_HEADER]: computeSignature(request, date, auth.secretKey),
    },
  };
};
