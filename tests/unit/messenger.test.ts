import { afterEach, describe, expect, it, vi } from "vitest";
import { createMessenger } from "@/lib/agents/messenger";
import { TransportError } from "@/lib/errors";

const AGENT_URL = "http://127.0.0.1:9010/";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function stubFetch(implementation: (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(implementation);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

async function sendError(timeoutMs = 1_000): Promise<TransportError> {
  try {
    await createMessenger().send(AGENT_URL, "task", { timeoutMs });
  } catch (error) {
    if (error instanceof TransportError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a TransportError");
}

describe("createMessenger", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a message/send request and reads a message reply", async () => {
    const fetchMock = stubFetch(async () =>
      jsonResponse({
        jsonrpc: "2.0",
        id: "1",
        result: {
          kind: "message",
          role: "agent",
          messageId: "m-1",
          contextId: "ctx-1",
          parts: [{ kind: "text", text: "```solidity\ncontract A {}\n```" }],
        },
      }),
    );

    const reply = await createMessenger().send(AGENT_URL, "Exploit SampleProtocol", {
      timeoutMs: 1_000,
      contextId: "ctx-1",
    });

    expect(reply.text).toBe("```solidity\ncontract A {}\n```");
    expect(reply.contextId).toBe("ctx-1");

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(AGENT_URL);
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toMatchObject({
      jsonrpc: "2.0",
      method: "message/send",
      params: {
        message: {
          kind: "message",
          role: "user",
          contextId: "ctx-1",
          parts: [{ kind: "text", text: "Exploit SampleProtocol" }],
        },
      },
    });
  });

  it("reads artifacts before status messages on task replies", async () => {
    stubFetch(async () =>
      jsonResponse({
        jsonrpc: "2.0",
        id: "1",
        result: {
          kind: "task",
          id: "task-1",
          contextId: "ctx-2",
          status: {
            state: "completed",
            message: {
              kind: "message",
              role: "agent",
              messageId: "m-2",
              parts: [{ kind: "text", text: "done" }],
            },
          },
          artifacts: [{ artifactId: "a-1", name: "exploit", parts: [{ kind: "text", text: "pragma solidity ^0.8.10;" }] }],
        },
      }),
    );

    const reply = await createMessenger().send(AGENT_URL, "task", { timeoutMs: 1_000 });

    expect(reply.text).toBe("pragma solidity ^0.8.10;");
    expect(reply.contextId).toBe("ctx-2");
  });

  it("raises JSON-RPC errors as transport errors", async () => {
    stubFetch(async () =>
      jsonResponse({ jsonrpc: "2.0", id: "1", error: { code: -32603, message: "agent crashed" } }),
    );

    const error = await sendError();

    expect(error.message).toBe("Agent returned error -32603: agent crashed");
    expect(error.url).toBe(AGENT_URL);
    expect(error.code).toBe("transport_error");
  });

  it("raises HTTP failures with their status", async () => {
    stubFetch(async () => jsonResponse({ error: "nope" }, 503));

    const error = await sendError();

    expect(error.message).toBe("Agent responded with status 503");
    expect(error.status).toBe(503);
  });

  it("raises responses without a result", async () => {
    stubFetch(async () => jsonResponse({ jsonrpc: "2.0", id: "1" }));

    expect((await sendError()).message).toBe("Agent response carried no result");
  });

  it("raises unreachable agents", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed");
    });

    expect((await sendError()).message).toBe("Failed to reach agent: fetch failed");
  });

  it("aborts agents that exceed the timeout", async () => {
    stubFetch(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );

    expect((await sendError(20)).message).toBe("Agent did not respond within 20ms");
  });
});
