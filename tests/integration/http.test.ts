import { strict as assert } from "node:assert";
import { IncomingMessage, ServerResponse } from "node:http";
import { Socket } from "node:net";
import type { CatalogSourceProvider } from "../../server/src/catalog-source";
import { loadConfig } from "../../server/src/config";
import { createRequestHandler } from "../../server/src/http";
import { createServer } from "../../server/src/index";

/**
 * HTTP 라우팅 테스트 — 소켓 없이 요청/응답 객체를 직접 만들어 핸들러에 넘긴다.
 */
class RecordedResponse extends ServerResponse {
  body = "";

  override end(chunk?: unknown): this {
    if (typeof chunk === "string") this.body = chunk;
    return this;
  }
}

interface FakeRequest {
  body?: string;
  headers?: Record<string, string>;
}

async function send(method: string, url: string, input: FakeRequest = {}) {
  const req = new IncomingMessage(new Socket());
  req.method = method;
  req.url = url;
  req.headers = input.headers ?? {};
  if (input.body !== undefined) req.push(input.body);
  req.push(null);

  const res = new RecordedResponse(req);
  await handle(req, res);
  return { status: res.statusCode, body: res.body ? JSON.parse(res.body) : null };
}

const EDITOR = { authorization: "Bearer test-token" };

const provider: CatalogSourceProvider = {
  kind: "memory",
  async list() {
    return [
      { layer: "tossup", locale: "en", source: "tossup-bank = Bank { $points } points" },
      { layer: "tossup", locale: "pt", source: "tossup-winner = { $player } vence com { $score } pontos!" },
      { layer: "shared", locale: "en", source: "game-round-start = Round { $round }." },
    ];
  },
  async save() {},
};

const app = createServer({
  config: loadConfig({}),
  provider,
  async authorize(authHeader) {
    if (!authHeader) return { code: "UNAUTHORIZED", message: "Missing or invalid Authorization header" };
    if (authHeader !== EDITOR.authorization) return { code: "FORBIDDEN", message: "not an editor" };
    return { userId: "editor-1", userEmail: "editor@example.com" };
  },
});
const handle = createRequestHandler(app);

async function runTests() {
  await app.init();

  // health / preflight / unknown route
  {
    assert.deepEqual(await send("GET", "/health"), { status: 200, body: { ok: true, tables: 3 } });
    assert.deepEqual(await send("OPTIONS", "/api/v1/locales"), { status: 204, body: null });

    const missing = await send("GET", "/api/v1/nowhere", { headers: { "x-request-id": "req-42" } });
    assert.equal(missing.status, 404);
    assert.equal(missing.body.error.code, "NOT_FOUND");
    assert.equal(missing.body.meta.request_id, "req-42");
  }

  console.log("✓ health and routing test passed");

  // render
  {
    const viaQuery = await send("GET", "/api/v1/messages/pt/tossup-winner?player=Ana&score=340");
    assert.equal(viaQuery.status, 200);
    assert.deepEqual(viaQuery.body.data, { locale: "pt", key: "tossup-winner", text: "Ana vence com 340 pontos!" });

    const viaBody = await send("POST", "/api/v1/messages/pt/render", {
      body: JSON.stringify({ key: "tossup-bank", args: { points: 5 } }),
    });
    assert.equal(viaBody.status, 200);
    assert.equal(viaBody.body.data.text, "Bank 5 points");

    const badJson = await send("POST", "/api/v1/messages/en/render", { body: "{" });
    assert.equal(badJson.status, 400);
    assert.equal(badJson.body.error.message, "request body is not valid JSON");

    const notObject = await send("POST", "/api/v1/messages/en/render", { body: "[1]" });
    assert.equal(notObject.status, 400);
    assert.equal(notObject.body.error.message, "request body must be a JSON object");

    const unknownKey = await send("GET", "/api/v1/messages/en/tossup-nope");
    assert.equal(unknownKey.status, 404);
    assert.equal(unknownKey.body.error.code, "MISSING_KEY");

    const missingArg = await send("GET", "/api/v1/messages/en/tossup-bank");
    assert.equal(missingArg.status, 422);
    assert.equal(missingArg.body.error.code, "MISSING_ARGUMENT");
  }

  console.log("✓ render routes test passed");

  // 카탈로그 변경은 편집자만
  {
    const source = JSON.stringify({ source: "game-round-start = Rodada { $round }." });

    const anonymous = await send("PUT", "/api/v1/catalog/shared%2Fpt", { body: source });
    assert.equal(anonymous.status, 401);
    assert.equal(anonymous.body.error.code, "UNAUTHORIZED");

    const player = await send("POST", "/api/v1/catalog/sync", { headers: { authorization: "Bearer other" } });
    assert.equal(player.status, 403);
    assert.equal(player.body.error.code, "FORBIDDEN");

    assert.equal(app.resolver.status("shared/pt"), "absent");

    const encoded = await send("PUT", "/api/v1/catalog/shared%2Fpt", { body: source, headers: EDITOR });
    assert.equal(encoded.status, 200);
    assert.deepEqual(encoded.body.data, { tableId: "shared/pt", keys: 1 });

    const round = await send("GET", "/api/v1/messages/pt/game-round-start?round=2");
    assert.equal(round.body.data.text, "Rodada 2.");

    const broken = await send("PUT", "/api/v1/catalog/pt", {
      body: JSON.stringify({ source: "tossup-winner" }),
      headers: EDITOR,
    });
    assert.equal(broken.status, 422);
    assert.equal(broken.body.error.code, "PARSE_ERROR");

    const synced = await send("POST", "/api/v1/catalog/sync", { headers: EDITOR });
    assert.equal(synced.status, 200);
    assert.deepEqual(synced.body.data.loaded, ["en", "pt", "shared/en"]);
  }

  console.log("✓ editor routes test passed");

  // 조회
  {
    const tables = await send("GET", "/api/v1/catalog/tables");
    assert.deepEqual(
      tables.body.data.tables.map((table: { tableId: string }) => table.tableId),
      ["en", "pt", "shared/en", "shared/pt"],
    );

    const locales = await send("GET", "/api/v1/locales");
    assert.deepEqual(locales.body.data.locales, ["en", "pt"]);

    const validation = await send("GET", "/api/v1/catalog/validate?reference=en&placeholders=true");
    assert.equal(validation.body.data.reference, "en");
    assert.deepEqual(
      validation.body.data.issues.map((issue: { message: string }) => issue.message),
      [`pt: missing "tossup-bank"`, `pt: "tossup-winner" is not in en`],
    );
  }

  console.log("✓ listing routes test passed");
  console.log("All tests passed!");
}

runTests().catch((err) => {
  console.error("Test failed:", err);
  process.exit(1);
});
