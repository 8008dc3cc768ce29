import http from "node:http";
import { randomUUID } from "node:crypto";

import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type ProblemCode } from "./problem.js";
import { asInt, asString, isRecord, pushErr } from "../core/validation.js";
import { BundleLoadError, BundleUnavailableError } from "../core/errors.js";
import type { SearchService } from "./engine.js";

const SERVICE = "positional-search";
const VERSION = "0.1.0";

const MAX_QUERY_LENGTH = 4096;
const MAX_RESULTS = 100;
const MAX_SUGGESTIONS = 50;

export interface ServerOptions {
  port?: number;
  service: SearchService;
}

export function createServer(opts: ServerOptions): http.Server {
  const start = Date.now();
  const { service } = opts;

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const fail = (status: number, code: ProblemCode, detail: string, errors?: FieldError[]) =>
      sendProblem(res, status, problem({ status, code, detail, instance: url.pathname, requestId, errors }));

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        const st = service.status();
        return sendJson(res, st.loaded ? 200 : 503, {
          status: st.loaded ? "ok" : "unavailable",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          documents: st.meta?.documentCount ?? 0,
          terms: st.meta?.termCount ?? 0,
          builtAt: st.meta?.builtAt ?? null,
        });
      }

      if (req.method === "POST" && url.pathname === "/search") {
        if (!isJson(req)) {
          return fail(415, "UNSUPPORTED_MEDIA_TYPE", "content-type must be application/json");
        }

        const started = Date.now();
        const body = await readJson(req);
        if (!isRecord(body)) {
          return fail(400, "INVALID_ARGUMENT", "body must be an object");
        }

        const errors: FieldError[] = [];
        // an empty query is allowed and returns no results
        const query = asString(body.query);
        if (query === undefined) pushErr(errors, "$.query", "must be a string");
        if (query && query.length > MAX_QUERY_LENGTH) pushErr(errors, "$.query", "too long");

        const limit = body.limit === undefined ? 10 : asInt(body.limit);
        if (limit === undefined || limit < 1 || limit > MAX_RESULTS) {
          pushErr(errors, "$.limit", `must be an integer between 1 and ${MAX_RESULTS}`);
        }

        if (errors.length || query === undefined || limit === undefined) {
          return fail(400, "INVALID_ARGUMENT", "invalid request", errors);
        }

        const r = service.search({ query, limit });
        return sendJson(res, 200, { ...r, tookMs: Date.now() - started });
      }

      if (req.method === "GET" && url.pathname === "/suggest") {
        const prefix = url.searchParams.get("prefix") ?? "";
        const rawLimit = url.searchParams.get("limit");
        const limit = rawLimit === null ? 10 : Number(rawLimit);
        if (!Number.isInteger(limit) || limit < 1 || limit > MAX_SUGGESTIONS) {
          return fail(400, "INVALID_ARGUMENT", "invalid request", [
            { path: "limit", message: `must be an integer between 1 and ${MAX_SUGGESTIONS}` },
          ]);
        }
        return sendJson(res, 200, { prefix, suggestions: prefix.trim() ? service.suggest(prefix, limit) : [] });
      }

      const docMatch = /^\/documents\/(\d+)$/.exec(url.pathname);
      if (req.method === "GET" && docMatch) {
        const id = Number(docMatch[1]);
        const doc = Number.isSafeInteger(id) ? service.getDocument(id) : undefined;
        if (!doc) return fail(404, "NOT_FOUND", `document ${docMatch[1]} not found`);
        return sendJson(res, 200, doc);
      }

      if (req.method === "POST" && url.pathname === "/admin/reload") {
        const meta = await service.reload();
        console.log(`reloaded index: ${meta.documentCount} documents, built ${meta.builtAt}`);
        return sendJson(res, 200, { reloaded: true, meta });
      }

      return fail(404, "NOT_FOUND", "not found");
    } catch (e) {
      if (e instanceof BundleUnavailableError) {
        return fail(503, "BUNDLE_UNAVAILABLE", e.message);
      }
      if (e instanceof BundleLoadError) {
        console.error(`[${requestId}] reload failed, keeping previous index: ${e.message}`);
        return fail(503, "BUNDLE_LOAD", e.message);
      }
      if (e instanceof SyntaxError) {
        return fail(400, "INVALID_ARGUMENT", "body is not valid JSON");
      }
      console.error(`[${requestId}]`, e);
      return fail(500, "INTERNAL", "internal error");
    }
  });
}

export async function startServer(opts: ServerOptions): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");
  return raw.length ? JSON.parse(raw) : null;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(body));
}

function sendProblem(res: http.ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(JSON.stringify(body));
}
