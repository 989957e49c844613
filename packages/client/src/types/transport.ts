/**
 * Transport-level types.
 */

// ============================================================================
// Credentials
// ============================================================================

/**
 * Secret used to sign requests.
 */
export type AuthSettings = {
  userId: string;
  secretKey: string;
};

/**
 * Identity material attached to every call. A missing `auth` means the
 * client is not configured; calls fail without touching the network.
 */
export type Credentials = {
  auth?: AuthSettings;
  /** Stable per-installation UUID */
  installId?: string;
};

// ============================================================================
// HTTP
// ============================================================================

export type HttpRequest = {
  method: "POST";
  url: string;
  headers: Record<string, string>;
  body: Uint8Array;
  /** Wall-clock limit for the full round trip; overrides the executor default */
  timeoutMs?: number;
};

export type HttpResponse = {
  status: number;
  statusText: string;
  body: Uint8Array;
};

/**
 * Executes one HTTP round trip. Rejects on transport faults only;
 * any HTTP status resolves.
 */
export type HttpExecutor = (request: HttpRequest) => Promise<HttpResponse>;
