/**
 * @nstack/client - Signed RPC transport for the NStack server
 *
 * @packageDocumentation
 */

// =============================================================================
// Result model
// =============================================================================

export {
  clientError,
  DEFAULT_SERVER_NAME,
  formatResult,
  isSuccess,
  type Result,
  serverError,
  success,
} from "./result.ts";

// =============================================================================
// Transport
// =============================================================================

export {
  CALL_TIMEOUT_MS,
  createTransport,
  MISSING_CREDENTIALS_MESSAGE,
  type Transport,
  type TransportConfig,
} from "./transport.ts";
export {
  agentOptions,
  createHttpClient,
  DEFAULT_HTTP_TIMEOUT_MS,
  type HttpClient,
  type HttpClientOptions,
} from "./http.ts";

// =============================================================================
// Requests
// =============================================================================

export { type BuildRequestParams, buildRequest, INSTALL_ID_COOKIE } from "./request.ts";
export {
  canonicalRequest,
  computeSignature,
  DATE_HEADER,
  SIGNATURE_HEADER,
  signRequest,
  USER_HEADER,
} from "./auth/sign.ts";

// =============================================================================
// Types
// =============================================================================

export type {
  AuthSettings,
  Credentials,
  HttpExecutor,
  HttpRequest,
  HttpResponse,
} from "./types/index.ts";

export { describeError } from "./utils/errors.ts";
