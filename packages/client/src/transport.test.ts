/**
 * Transport tests.
 *
 * The HTTP executor is replaced by an in-process double that records the
 * requests it receives.
 */

import { type Codec, either, encode, int, left, list, right, text } from "@nstack/codec";
import { defineCall, gcCommand, listModulesCommand, stopCommand } from "@nstack/protocol";
import { describe, expect, it, vi } from "vitest";
import { SIGNATURE_HEADER } from "./auth/sign.ts";
import { CALL_TIMEOUT_MS, createTransport, MISSING_CREDENTIALS_MESSAGE } from "./transport.ts";
import type { Credentials, HttpExecutor, HttpResponse } from "./types/transport.ts";

const BASE_URL = "https://localhost:8443/";
const INSTALL_ID = "123e4567-e89b-12d3-a456-426614174000";

const credentials: Credentials = {
  auth: { userId: "test-user", secretKey: "test-secret" },
  installId: INSTALL_ID,
};

const ok = (body: Uint8Array): HttpResponse => ({ status: 200, statusText: "OK", body });

const returning = <T>(codec: Codec<T>, value: T): HttpResponse =>
  ok(encode(either(text, codec), right(value)));

const setup = (
  respond: HttpExecutor,
  creds: Credentials = credentials
) => {
  const http = vi.fn<HttpExecutor>(respond);
  const transport = createTransport({
    baseUrl: BASE_URL,
    credentials: creds,
    http,
    clock: () => new Date("2026-01-01T00:00:00.000Z"),
  });
  return { http, transport };
};

describe("createTransport", () => {
  describe("credentials", () => {
    it("should fail fast without an auth secret", async () => {
      const { http, transport } = setup(async () => returning(list(text), []), {
        installId: INSTALL_ID,
      });

      const result = await transport.call(listModulesCommand, true);

      expect(result).toEqual({ type: "clientError", message: MISSING_CREDENTIALS_MESSAGE });
      expect(http).not.toHaveBeenCalled();
    });

    it("should use the fixed missing-credentials message", () => {
      expect(MISSING_CREDENTIALS_MESSAGE).toBe(
        "Missing or invalid credentials. Please run the 'set-server' configuration command."
      );
    });
  });

  describe("request", () => {
    it("should POST the encoded argument to the call path", async () => {
      const { http, transport } = setup(async () => returning(list(text), []));

      await transport.call(listModulesCommand, true);

      expect(http).toHaveBeenCalledTimes(1);
      const request = http.mock.calls[0]?.[0];
      expect(request?.method).toBe("POST");
      expect(request?.url).toBe("https://localhost:8443/ListModulesCommand");
      expect(Array.from(request?.body ?? [])).toEqual([1]);
      expect(request?.headers[SIGNATURE_HEADER]).toMatch(/^[0-9a-f]{64}$/);
    });

    it("should always use the 15 minute call timeout", async () => {
      const { http, transport } = setup(async () => returning(list(text), []));

      await transport.call(gcCommand, null);

      expect(CALL_TIMEOUT_MS).toBe(900_000);
      expect(http.mock.calls[0]?.[0].timeoutMs).toBe(900_000);
    });

    it("should send the install id cookie when set", async () => {
      const { http, transport } = setup(async () => returning(list(text), []));

      await transport.call(gcCommand, null);

      expect(http.mock.calls[0]?.[0].headers.Cookie).toBe(`NSTACKINSTANCEID=${INSTALL_ID}`);
    });

    it("should send no cookie without an install id", async () => {
      const { http, transport } = setup(async () => returning(list(text), []), {
        auth: { userId: "test-user", secretKey: "test-secret" },
      });

      await transport.call(gcCommand, null);

      expect(http.mock.calls[0]?.[0].headers.Cookie).toBeUndefined();
    });

    it("should send an empty body for argument-less calls", async () => {
      const { http, transport } = setup(async () => returning(list(text), []));

      await transport.call(gcCommand, null);

      expect(http.mock.calls[0]?.[0].body.length).toBe(0);
    });

    it("should report arguments the codec cannot encode", async () => {
      const { http, transport } = setup(async () => returning(int, 0));
      const call = defineCall("CountCommand", int, int);

      const result = await transport.call(call, 1.5);

      expect(result).toEqual({
        type: "clientError",
        message: "Cannot encode argument: int is not a safe integer: 1.5",
      });
      expect(http).not.toHaveBeenCalled();
    });
  });

  describe("response mapping", () => {
    it("should return success for 200 with a right value", async () => {
      const { transport } = setup(async () => returning(list(text), ["Demo.Classify:0.0.1"]));

      const result = await transport.call(listModulesCommand, false);

      expect(result).toEqual({ type: "success", value: ["Demo.Classify:0.0.1"] });
    });

    it("should return a server error for 200 with a left value", async () => {
      const { transport } = setup(async () =>
        ok(encode(either(text, list(text)), left("Process 7 not found")))
      );

      const result = await transport.call(listModulesCommand, false);

      expect(result).toEqual({ type: "serverError", message: "Process 7 not found" });
    });

    it("should decode a unit return value", async () => {
      const { transport } = setup(async () => ok(new Uint8Array([1])));

      const result = await transport.call(stopCommand, "7");

      expect(result).toEqual({ type: "success", value: null });
    });

    it("should return a server error carrying the status for non-200", async () => {
      const { transport } = setup(async () => ({
        status: 503,
        statusText: "Service Unavailable",
        body: new Uint8Array([1, 2, 3]),
      }));

      const result = await transport.call(gcCommand, null);

      expect(result).toEqual({ type: "serverError", message: "503 Service Unavailable" });
    });

    it("should fall back to the bare status code without status text", async () => {
      const { transport } = setup(async () => ({
        status: 502,
        statusText: "",
        body: new Uint8Array(),
      }));

      expect(await transport.call(gcCommand, null)).toEqual({
        type: "serverError",
        message: "502",
      });
    });

    it("should return a client error for an undecodable body", async () => {
      const { transport } = setup(async () => ok(new Uint8Array([7])));

      const result = await transport.call(gcCommand, null);

      expect(result).toEqual({
        type: "clientError",
        message: "Cannot decode return value: Invalid either tag 7 at offset 0",
      });
    });

    it("should return a client error for a truncated body", async () => {
      const { transport } = setup(async () => ok(new Uint8Array([1, 0, 0])));

      const result = await transport.call(gcCommand, null);

      expect(result).toEqual({
        type: "clientError",
        message: "Cannot decode return value: Too few bytes: needed 8 at offset 1, 2 left",
      });
    });
  });

  describe("transport faults", () => {
    it("should map a timeout to a client error", async () => {
      const { transport } = setup(async () => {
        throw Object.assign(new Error("The operation was aborted due to timeout"), {
          name: "TimeoutError",
        });
      });

      await expect(transport.call(gcCommand, null)).resolves.toEqual({
        type: "clientError",
        message: "Exception sending HTTP request: The operation was aborted due to timeout",
      });
    });

    it("should map a refused connection to a client error", async () => {
      const { transport } = setup(async () => {
        throw new TypeError("fetch failed", {
          cause: Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:8443"), {
            code: "ECONNREFUSED",
          }),
        });
      });

      await expect(transport.call(gcCommand, null)).resolves.toEqual({
        type: "clientError",
        message: "Exception sending HTTP request: fetch failed: connect ECONNREFUSED 127.0.0.1:8443",
      });
    });

    it("should map a TLS failure to a client error", async () => {
      const { transport } = setup(async () => {
        throw new TypeError("fetch failed", {
          cause: Object.assign(new Error("certificate has expired"), {
            code: "CERT_HAS_EXPIRED",
          }),
        });
      });

      await expect(transport.call(gcCommand, null)).resolves.toEqual({
        type: "clientError",
        message:
          "Exception sending HTTP request: fetch failed: certificate has expired [CERT_HAS_EXPIRED]",
      });
    });

    it("should contain an executor that throws synchronously", async () => {
      const { transport } = setup(() => {
        throw new Error("getaddrinfo ENOTFOUND nstack.invalid");
      });

      await expect(transport.call(gcCommand, null)).resolves.toEqual({
        type: "clientError",
        message: "Exception sending HTTP request: getaddrinfo ENOTFOUND nstack.invalid",
      });
    });
  });

  describe("debug", () => {
    it("should report the request and its outcome", async () => {
      const debug = vi.fn<(message: string) => void>();
      const transport = createTransport({
        baseUrl: BASE_URL,
        credentials,
        http: async () => returning(list(text), []),
        debug,
      });

      await transport.call(gcCommand, null);

      expect(debug).toHaveBeenCalledTimes(2);
      expect(debug.mock.calls[0]?.[0]).toBe(
        "POST https://localhost:8443/GarbageCollectCommand (0 bytes)"
      );
      expect(debug.mock.calls[1]?.[0]).toMatch(
        /^GarbageCollectCommand -> 200 OK in \d+ms \(9 bytes\)$/
      );
    });
  });
});
