/**
 * Type exports for @nstack/client
 */

export type {
  AuthSettings,
  Credentials,
  HttpExecutor,
  HttpRequest,
  HttpResponse,
} from "./transport.ts";
