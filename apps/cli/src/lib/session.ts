import { createHttpClient, createTransport, type Transport } from "@nstack/client";
import { type Settings, serverUrl } from "./config";
import type { OutputFormatter } from "./output";

/**
 * One HTTP client and transport for the lifetime of the process.
 */
export interface Session {
  settings: Settings;
  baseUrl: string;
  transport: Transport;
  close: () => Promise<void>;
}

export function createSession(settings: Settings, output: OutputFormatter): Session {
  if (settings.allowSelfSignedCertificates) {
    output.warn(
      "TLS certificate validation is disabled (server.allowSelfSignedCertificates); the server's identity is not verified."
    );
  }

  const http = createHttpClient({
    allowSelfSignedCertificates: settings.allowSelfSignedCertificates,
  });
  const baseUrl = serverUrl(settings);
  output.debug(`Server: ${baseUrl}`);

  const transport = createTransport({
    baseUrl,
    credentials: settings.credentials,
    http: http.execute,
    debug: (message) => output.debug(message),
  });

  return { settings, baseUrl, transport, close: http.close };
}
