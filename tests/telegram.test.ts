/**
 * Unit tests for the Telegram backend over a stubbed fetch.
 */
import { describe, test, expect, vi } from "vitest";
import { join } from "node:path";
import { TelegramBackend } from "../src/transport/telegram.js";
import { makeTmpDir, writeFile } from "./fixtures.js";

function reply(status: number, body: unknown): Response {
  return new Response(typeof body === "string" ? body : JSON.stringify(body), { status });
}

function backendWith(...responses: (Response | Error)[]) {
  const fetchImpl = vi.fn(async (_url: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const next = responses.shift();
    if (!next) throw new Error("unexpected call");
    if (next instanceof Error) throw next;
    return next;
  });
  const backend = new TelegramBackend({
    token: "test-token",
    apiBaseUrl: "https://bot.example.test/",
    fetchImpl,
  });
  return { backend, fetchImpl };
}

const message = { message_id: 7, chat: { id: -100123 } };

describe("TelegramBackend", () => {
  test("sendMessage posts JSON to the bot method url", async () => {
    const { backend, fetchImpl } = backendWith(reply(200, { ok: true, result: message }));
    const result = await backend.sendMessage("-100123", "hello", "MarkdownV2");

    expect(result).toEqual({ kind: "success", value: { chatId: "-100123", messageId: 7 } });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://bot.example.test/bottest-token/sendMessage");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: "-100123",
      text: "hello",
      parse_mode: "MarkdownV2",
    });
  });

  test("sendDocument uploads multipart form data", async () => {
    const path = writeFile(join(makeTmpDir(), "a.zip"), "zipbytes");
    const { backend, fetchImpl } = backendWith(reply(200, { ok: true, result: message }));
    const result = await backend.sendDocument("c", { path, filename: "a.zip" }, "cap", "MarkdownV2");

    expect(result.kind).toBe("success");
    const body = fetchImpl.mock.calls[0][1]?.body;
    expect(body).toBeInstanceOf(FormData);
    if (!(body instanceof FormData)) return;
    expect(body.get("chat_id")).toBe("c");
    expect(body.get("caption")).toBe("cap");
    expect(body.get("parse_mode")).toBe("MarkdownV2");
    const file = body.get("document");
    expect(file).toBeInstanceOf(Blob);
    if (!(file instanceof Blob)) return;
    expect(await file.text()).toBe("zipbytes");
  });

  test("429 with retry_after is retryable", async () => {
    const { backend } = backendWith(
      reply(429, {
        ok: false,
        error_code: 429,
        description: "Too Many Requests: retry after 3",
        parameters: { retry_after: 3 },
      }),
    );
    expect(await backend.sendMessage("c", "x")).toEqual({
      kind: "retryable",
      afterMs: 3000,
      reason: "sendMessage: 429 Too Many Requests: retry after 3",
    });
  });

  test("5xx is a transient server failure", async () => {
    const { backend } = backendWith(reply(502, "<html>bad gateway</html>"));
    const result = await backend.sendMessage("c", "x");
    expect(result).toEqual({
      kind: "failure",
      failure: "server",
      transient: true,
      reason: "sendMessage: unexpected response (HTTP 502)",
    });
  });

  test("401 is a permanent auth failure", async () => {
    const { backend } = backendWith(reply(401, { ok: false, error_code: 401, description: "Unauthorized" }));
    const result = await backend.getSelfId();
    expect(result).toEqual({
      kind: "failure",
      failure: "auth",
      transient: false,
      reason: "getMe: 401 Unauthorized",
    });
  });

  test("400 is a permanent rejection", async () => {
    const { backend } = backendWith(
      reply(400, { ok: false, error_code: 400, description: "Bad Request: chat not found" }),
    );
    const result = await backend.forwardMessage("c", { chatId: "p", messageId: 1 });
    expect(result.kind === "failure" && result.failure).toBe("rejected");
    expect(result.kind === "failure" && result.transient).toBe(false);
  });

  test("network error is transient", async () => {
    const { backend } = backendWith(new Error("ECONNRESET"));
    expect(await backend.deleteMessage({ chatId: "c", messageId: 1 })).toEqual({
      kind: "failure",
      failure: "network",
      transient: true,
      reason: "deleteMessage: ECONNRESET",
    });
  });

  test("unexpected result shape is malformed", async () => {
    const { backend } = backendWith(reply(200, { ok: true, result: { nope: 1 } }));
    const result = await backend.sendMessage("c", "x");
    expect(result.kind === "failure" && result.failure).toBe("malformed");
  });

  test("membership status and own id", async () => {
    const { backend, fetchImpl } = backendWith(
      reply(200, { ok: true, result: { id: 42, is_bot: true } }),
      reply(200, { ok: true, result: { status: "kicked", user: { id: 42 } } }),
    );
    expect(await backend.getSelfId()).toEqual({ kind: "success", value: 42 });
    expect(await backend.getMembershipStatus("c", 42)).toEqual({ kind: "success", value: "kicked" });
    expect(JSON.parse(String(fetchImpl.mock.calls[1][1]?.body))).toEqual({ chat_id: "c", user_id: 42 });
  });

  test("deleteMessage expects a true result", async () => {
    const { backend } = backendWith(reply(200, { ok: true, result: true }));
    expect(await backend.deleteMessage({ chatId: "c", messageId: 3 })).toEqual({
      kind: "success",
      value: undefined,
    });
  });
});
