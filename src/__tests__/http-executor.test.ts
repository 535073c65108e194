import fs from "fs";
import http from "http";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigError, RequestBuildError } from "../errors";
import { execute, executeWithStreaming, isStreamingResponse } from "../http-executor";
import type { ExecutionOptions } from "../types";

const limits: ExecutionOptions = { requestTimeoutSeconds: 5, maxResponseSizeBytes: 1024 * 1024 };

type Received = {
  method?: string;
  headers: http.IncomingHttpHeaders;
  body: string;
};

let server: http.Server | undefined;

async function startServer(handler: (req: http.IncomingMessage, res: http.ServerResponse, received: Received) => void) {
  const srv = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      handler(req, res, { method: req.method, headers: req.headers, body: Buffer.concat(chunks).toString("utf8") });
    });
  });
  server = srv;
  await new Promise<void>((resolve) => srv.listen(0, "127.0.0.1", resolve));
  const address = srv.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  return `http://127.0.0.1:${address.port}`;
}

afterEach(async () => {
  const srv = server;
  server = undefined;
  if (!srv) return;
  srv.closeAllConnections();
  await new Promise<void>((resolve) => srv.close(() => resolve()));
});

describe("execute", () => {
  it("returns status, headers and body", async () => {
    const url = await startServer((_req, res) => {
      res.writeHead(200, { "Content-Type": "text/plain", "X-Test": "yes" });
      res.end("ok");
    });

    const result = await execute({ method: "GET", url: `${url}/hello`, headers: {} }, undefined, limits);

    expect(result.status).toBe(200);
    expect(result.statusText).toBe("200 OK");
    expect(result.headers["x-test"]).toBe("yes");
    expect(result.body).toBe("ok");
    expect(result.responseSizeBytes).toBe(2);
    expect(result.requestSizeBytes).toBe(0);
    expect(result.error).toBeUndefined();
  });

  it("sends the body with its length", async () => {
    let seen: Received | undefined;
    const url = await startServer((_req, res, received) => {
      seen = received;
      res.writeHead(201);
      res.end();
    });

    const result = await execute(
      { method: "POST", url, headers: { "Content-Type": "application/json" }, body: '{"name":"ada"}' },
      undefined,
      limits
    );

    expect(result.status).toBe(201);
    expect(result.requestSizeBytes).toBe(14);
    expect(seen?.method).toBe("POST");
    expect(seen?.headers["content-length"]).toBe("14");
    expect(seen?.body).toBe('{"name":"ada"}');
  });

  it("keeps non-2xx responses as results", async () => {
    const url = await startServer((_req, res) => {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("missing");
    });

    const result = await execute({ method: "GET", url, headers: {} }, undefined, limits);

    expect(result.status).toBe(404);
    expect(result.statusText).toBe("404 Not Found");
    expect(result.body).toBe("missing");
    expect(result.error).toBeUndefined();
  });

  it("wraps a GraphQL query and formats the envelope", async () => {
    let seen: Received | undefined;
    const url = await startServer((_req, res, received) => {
      seen = received;
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end('{"data":null,"errors":[{"message":"bad"}]}');
    });

    const result = await execute(
      { method: "GET", url, headers: {}, body: "{ user { id } }", protocol: "graphql" },
      undefined,
      limits
    );

    expect(seen?.method).toBe("POST");
    expect(seen?.headers["content-type"]).toBe("application/json");
    expect(JSON.parse(seen?.body ?? "")).toEqual({ query: "{ user { id } }" });
    expect(result.body).toBe(JSON.stringify({ data: null, errors: [{ message: "bad" }] }, null, 2));
  });

  it("formats a GraphQL envelope that lists errors before data", async () => {
    const url = await startServer((_req, res) => {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end('{"errors":[{"message":"bad"}],"data":null}');
    });

    const result = await execute({ method: "POST", url, headers: {}, body: "{ user { id } }", protocol: "graphql" }, undefined, limits);

    expect(result.body).toBe(JSON.stringify({ data: null, errors: [{ message: "bad" }] }, null, 2));
  });

  it("lets a caller Content-Type override the GraphQL default", async () => {
    let seen: Received | undefined;
    const url = await startServer((_req, res, received) => {
      seen = received;
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end('{"data":{"ok":true}}');
    });

    const result = await execute(
      { method: "POST", url, headers: { "content-type": "application/graphql" }, body: "{ ok }", protocol: "graphql" },
      undefined,
      limits
    );

    expect(seen?.headers["content-type"]).toBe("application/graphql");
    expect(result.body).toBe('{\n  "ok": true\n}');
  });

  it("stops at the size cap and keeps what was read", async () => {
    const url = await startServer((_req, res) => {
      res.writeHead(200, { "Content-Type": "text/plain", "Content-Length": "20" });
      res.end("01234567890123456789");
    });

    const result = await execute({ method: "GET", url, headers: {} }, undefined, {
      requestTimeoutSeconds: 5,
      maxResponseSizeBytes: 10,
    });

    expect(result.status).toBe(200);
    expect(result.error).toBe("response size exceeds maximum allowed size (10 bytes)");
    expect(result.body.length).toBeLessThanOrEqual(10);
  });

  it("reports a timeout when the server never answers", async () => {
    const url = await startServer(() => {
      // never respond
    });

    const result = await execute({ method: "GET", url, headers: {} }, undefined, {
      requestTimeoutSeconds: 0.2,
      maxResponseSizeBytes: 1024,
    });

    expect(result.status).toBe(0);
    expect(result.error).toBe("request timed out after 0.2s");
  });

  it("ends early as cancelled when the caller signal fires", async () => {
    const url = await startServer(() => {
      // never respond
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    const result = await execute({ method: "GET", url, headers: {} }, undefined, limits, controller.signal);

    expect(result.status).toBe(0);
    expect(result.error).toBe("Request cancelled");
    expect(result.durationMs).toBeLessThan(4000);
  });

  it("reports a refused connection as a result", async () => {
    const url = await startServer(() => undefined);
    const srv = server;
    server = undefined;
    await new Promise<void>((resolve) => srv?.close(() => resolve()));

    const result = await execute({ method: "GET", url, headers: {} }, undefined, limits);

    expect(result.status).toBe(0);
    expect(result.error).toMatch(/ECONNREFUSED/);
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("throws RequestBuildError for an unusable URL", async () => {
    await expect(execute({ method: "GET", url: "not a url", headers: {} }, undefined, limits)).rejects.toThrow(
      new RequestBuildError("failed to create request: invalid URL 'not a url'")
    );
    await expect(execute({ method: "GET", url: "ftp://example.com", headers: {} }, undefined, limits)).rejects.toBeInstanceOf(
      RequestBuildError
    );
  });

  it("throws ConfigError for unreadable TLS material before connecting", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "restline-ca-"));
    try {
      const caFile = path.join(dir, "ca.pem");
      fs.writeFileSync(caFile, "not a certificate");

      await expect(
        execute({ method: "GET", url: "https://127.0.0.1:1/", headers: {} }, { caFile }, limits)
      ).rejects.toBeInstanceOf(ConfigError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("executeWithStreaming", () => {
  it("delivers streaming chunks and signals done once", async () => {
    const url = await startServer((_req, res) => {
      res.writeHead(200, { "Content-Type": "text/event-stream" });
      res.write("data: one\n\n");
      setTimeout(() => res.end("data: two\n\n"), 20);
    });

    const chunks: string[] = [];
    let doneCount = 0;
    const controller = new AbortController();
    const result = await executeWithStreaming(controller.signal, { method: "GET", url, headers: {} }, undefined, limits, (chunk, done) => {
      if (done) doneCount++;
      if (chunk) chunks.push(chunk.toString("utf8"));
    });

    expect(result.error).toBeUndefined();
    expect(result.body).toBe("data: one\n\ndata: two\n\n");
    expect(chunks.join("")).toBe(result.body);
    expect(doneCount).toBe(1);
  });

  it("signals done without chunks for a plain response", async () => {
    const url = await startServer((_req, res) => {
      res.writeHead(200, { "Content-Type": "application/json", "Content-Length": "2" });
      res.end("{}");
    });

    const calls: Array<[boolean, boolean]> = [];
    const controller = new AbortController();
    const result = await executeWithStreaming(controller.signal, { method: "GET", url, headers: {} }, undefined, limits, (chunk, done) => {
      calls.push([chunk !== undefined, done]);
    });

    expect(result.body).toBe("{}");
    expect(calls).toEqual([[false, true]]);
  });

  it("keeps the partial body when cancelled mid-stream", async () => {
    const url = await startServer((_req, res) => {
      res.writeHead(200, { "Content-Type": "text/event-stream" });
      res.write("hello ");
      // hold the response open
    });

    const controller = new AbortController();
    let doneCount = 0;
    const result = await executeWithStreaming(controller.signal, { method: "GET", url, headers: {} }, undefined, limits, (chunk, done) => {
      if (done) doneCount++;
      if (chunk) controller.abort();
    });

    expect(result.status).toBe(200);
    expect(result.body).toBe("hello ");
    expect(result.error).toBe("Request cancelled");
    expect(doneCount).toBe(1);
  });

  it("stops a stream at the size cap", async () => {
    const url = await startServer((_req, res) => {
      res.writeHead(200, { "Content-Type": "text/event-stream" });
      res.end("01234567890123456789");
    });

    const controller = new AbortController();
    let doneCount = 0;
    const result = await executeWithStreaming(
      controller.signal,
      { method: "GET", url, headers: {} },
      undefined,
      { requestTimeoutSeconds: 5, maxResponseSizeBytes: 10 },
      (_chunk, done) => {
        if (done) doneCount++;
      }
    );

    expect(result.error).toBe("response size exceeds maximum allowed size (10 bytes)");
    expect(result.body.length).toBeLessThanOrEqual(10);
    expect(doneCount).toBe(1);
  });

  it("reports cancellation before any response", async () => {
    const url = await startServer(() => undefined);
    const controller = new AbortController();
    controller.abort();

    let doneCount = 0;
    const result = await executeWithStreaming(controller.signal, { method: "GET", url, headers: {} }, undefined, limits, (_chunk, done) => {
      if (done) doneCount++;
    });

    expect(result.status).toBe(0);
    expect(result.error).toBe("Request cancelled");
    expect(doneCount).toBe(1);
  });

  it("reads GraphQL responses whole even when they stream", async () => {
    const url = await startServer((_req, res) => {
      res.writeHead(200, { "Content-Type": "application/json", "Transfer-Encoding": "chunked" });
      res.write('{"data":');
      res.end('{"n":1}}');
    });

    const chunks: Buffer[] = [];
    const controller = new AbortController();
    const result = await executeWithStreaming(
      controller.signal,
      { method: "POST", url, headers: {}, body: "{ n }", protocol: "graphql" },
      undefined,
      limits,
      (chunk) => {
        if (chunk) chunks.push(chunk);
      }
    );

    expect(chunks).toHaveLength(0);
    expect(result.body).toBe('{\n  "n": 1\n}');
  });
});

describe("isStreamingResponse", () => {
  it("recognises streaming content types and chunked encoding", () => {
    expect(isStreamingResponse({ "content-type": "text/event-stream; charset=utf-8" })).toBe(true);
    expect(isStreamingResponse({ "content-type": "application/x-ndjson" })).toBe(true);
    expect(isStreamingResponse({ "transfer-encoding": "chunked" })).toBe(true);
    expect(isStreamingResponse({ "content-type": "application/json" })).toBe(false);
  });
});
