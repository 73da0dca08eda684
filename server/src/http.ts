import {
  createServer as createHttpServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import { randomUUID } from "node:crypto";
import { URL } from "node:url";
import { fail, statusFor, type ApiResult } from "../../src/api/contract";
import { isAuthError } from "./auth";
import type { ServerConfig } from "./config";
import { createServer, type CatalogServer } from "./index";
import { argumentsFromQuery } from "./routes/messages";

type JsonObject = Record<string, unknown>;

class BodyParseError extends Error {}

function readBody(req: IncomingMessage): Promise<JsonObject> {
  return new Promise((resolve, reject) => {
    let data = "";
    req.setEncoding("utf-8");
    req.on("data", (chunk: string) => {
      data += chunk;
    });
    req.on("end", () => {
      if (!data) {
        resolve({});
        return;
      }
      try {
        const parsed: unknown = JSON.parse(data);
        if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
          reject(new BodyParseError("request body must be a JSON object"));
          return;
        }
        resolve(Object.fromEntries(Object.entries(parsed)));
      } catch {
        reject(new BodyParseError("request body is not valid JSON"));
      }
    });
    req.on("error", reject);
  });
}

function sendJson(res: ServerResponse, statusCode: number, payload: unknown) {
  res.writeHead(statusCode, {
    "content-type": "application/json; charset=utf-8",
    "access-control-allow-origin": "*",
    "access-control-allow-methods": "GET, POST, PUT, OPTIONS",
    "access-control-allow-headers": "Content-Type, Authorization, X-Request-Id",
  });
  res.end(payload === null ? undefined : JSON.stringify(payload));
}

function sendResult(res: ServerResponse, out: ApiResult<unknown>) {
  sendJson(res, statusFor(out), out);
}

function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

export function createRequestHandler(app: CatalogServer) {
  return async function handle(req: IncomingMessage, res: ServerResponse) {
    const requestId = req.headers["x-request-id"]?.toString() || randomUUID();
    try {
      if (!req.url || !req.method) {
        sendJson(res, 400, fail(requestId, "VALIDATION_ERROR", "invalid request"));
        return;
      }

      // CORS preflight
      if (req.method === "OPTIONS") {
        sendJson(res, 204, null);
        return;
      }

      const ctx = app.createContext(requestId);
      const url = new URL(req.url, "http://localhost");
      const reqPath = url.pathname;
      const method = req.method.toUpperCase();

      if (method === "GET" && reqPath === "/health") {
        sendJson(res, 200, app.health());
        return;
      }

      // === 조회 / 렌더링 (공개) ===
      if (method === "GET" && reqPath === "/api/v1/locales") {
        sendResult(res, app.messages.listLocales(ctx));
        return;
      }

      const renderMatch = reqPath.match(/^\/api\/v1\/messages\/([^/]+)\/render$/);
      if (method === "POST" && renderMatch) {
        const locale = decodeSegment(renderMatch[1]);
        if (!locale) {
          sendResult(res, fail(requestId, "VALIDATION_ERROR", "invalid locale"));
          return;
        }
        const body = await readBody(req);
        sendResult(res, app.messages.render(ctx, locale, body));
        return;
      }

      const messageMatch = reqPath.match(/^\/api\/v1\/messages\/([^/]+)\/([^/]+)$/);
      if (method === "GET" && messageMatch) {
        const locale = decodeSegment(messageMatch[1]);
        const key = decodeSegment(messageMatch[2]);
        if (!locale || !key) {
          sendResult(res, fail(requestId, "VALIDATION_ERROR", "invalid locale or key"));
          return;
        }
        sendResult(res, app.messages.renderMessage(ctx, locale, key, argumentsFromQuery(url.searchParams)));
        return;
      }

      if (method === "GET" && reqPath === "/api/v1/catalog/tables") {
        sendResult(res, app.catalog.listTables(ctx));
        return;
      }

      if (method === "GET" && reqPath === "/api/v1/catalog/validate") {
        const reference = url.searchParams.get("reference") || undefined;
        const placeholders = url.searchParams.get("placeholders") === "true";
        sendResult(res, app.catalog.validate(ctx, reference, placeholders));
        return;
      }

      // === 카탈로그 변경 (편집자 인증 필수) ===
      if (reqPath.startsWith("/api/v1/catalog/") && (method === "PUT" || method === "POST")) {
        const authResult = await app.authorize(req.headers.authorization);
        if (isAuthError(authResult)) {
          sendResult(res, fail(requestId, authResult.code, authResult.message));
          return;
        }
        const editorCtx = { ...ctx, editorId: authResult.userId, editorEmail: authResult.userEmail };

        if (method === "POST" && reqPath === "/api/v1/catalog/sync") {
          sendResult(res, await app.catalog.sync(editorCtx));
          return;
        }

        // shared/zh-CN 처럼 레이어가 붙은 id는 경로 그대로 또는 %2F로 받는다
        const tableMatch = reqPath.match(/^\/api\/v1\/catalog\/(.+)$/);
        const tableId = tableMatch ? decodeSegment(tableMatch[1]) : null;
        if (method === "PUT" && tableId) {
          const body = await readBody(req);
          sendResult(res, await app.catalog.reloadTable(editorCtx, tableId, body));
          return;
        }
      }

      sendResult(res, fail(requestId, "NOT_FOUND", "route not found"));
    } catch (error) {
      if (error instanceof BodyParseError) {
        sendResult(res, fail(requestId, "VALIDATION_ERROR", error.message));
        return;
      }
      console.error(`[http] ${req.method} ${req.url} failed:`, error);
      sendResult(res, fail(requestId, "INTERNAL_ERROR", "unexpected error"));
    }
  };
}

export async function startHttpServer(config: ServerConfig): Promise<Server> {
  const app = createServer({ config });
  await app.init();

  const handle = createRequestHandler(app);
  const server = createHttpServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      console.error("[http] unhandled:", error);
    });
  });

  server.listen(config.port, () => {
    process.stdout.write(`Dicehall catalog API listening on http://localhost:${config.port}\n`);
  });
  return server;
}
