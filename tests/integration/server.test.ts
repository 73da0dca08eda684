import { strict as assert } from "node:assert";
import { statusFor } from "../../src/api/contract";
import type { CatalogSourceEntry, CatalogSourceProvider } from "../../server/src/catalog-source";
import { loadConfig } from "../../server/src/config";
import { createServer } from "../../server/src/index";
import { argumentsFromQuery } from "../../server/src/routes/messages";

/**
 * 통합 테스트 — 원문 공급자를 메모리 구현으로 바꿔 Supabase 없이 실행한다.
 */
function memorySource(entries: CatalogSourceEntry[]) {
  const saved: CatalogSourceEntry[] = [];
  const provider: CatalogSourceProvider = {
    kind: "memory",
    async list() {
      return entries.map((entry) => ({ ...entry }));
    },
    async save(entry) {
      saved.push(entry);
    },
  };
  return { provider, saved };
}

const { provider, saved } = memorySource([
  {
    layer: "tossup",
    locale: "en",
    source: "tossup-bank = Bank { $points } points\ntossup-winner = { $player } wins with { $score } points!",
  },
  { layer: "tossup", locale: "pt", source: "tossup-winner = { $player } vence com { $score } pontos!" },
  { layer: "shared", locale: "en", source: "game-round-start = Round { $round }." },
  { layer: "shared", locale: "pt", source: "game-round-start = Rodada { $round" },
  { layer: "poker", locale: "en", source: "poker-fold = Fold" },
]);

const server = createServer({ config: loadConfig({}), provider });

async function runTests() {
  const ctx = server.createContext("req-1", "2026-10-18T09:00:00Z");

  // startup sync
  {
    const report = await server.init();
    assert.equal(report.source, "memory");
    assert.deepEqual(report.loaded, ["en", "pt", "shared/en"]);
    assert.deepEqual(report.skipped, ["poker/en"]);
    assert.equal(report.failed.length, 1);
    assert.equal(report.failed[0].tableId, "shared/pt");
    assert.equal(report.failed[0].line, 1);
    assert.equal(report.failed[0].key, "game-round-start");
    assert.match(report.failed[0].reason, /^column 35: /);
    assert.deepEqual(
      report.issues.map((issue) => [issue.tableId, issue.key]),
      [["pt", "tossup-bank"]],
    );
    assert.deepEqual(server.health(), { ok: true, tables: 3 });
  }

  console.log("✓ startup sync test passed");

  // render
  {
    const out = server.messages.render(ctx, "pt", { key: "tossup-winner", args: { player: "Ana", score: 340 } });
    assert.ok("data" in out);
    if ("data" in out) {
      assert.deepEqual(out.data, { locale: "pt", key: "tossup-winner", text: "Ana vence com 340 pontos!" });
      assert.equal(out.meta.request_id, "req-1");
    }

    const fallback = server.messages.render(ctx, "pt", { key: "tossup-bank", args: { points: 5 } });
    assert.ok("data" in fallback && fallback.data.text === "Bank 5 points");

    // shared/pt failed to load, so pt falls through to shared/en
    const shared = server.messages.render(ctx, "pt", { key: "game-round-start", args: { round: 2 } });
    assert.ok("data" in shared && shared.data.text === "Round 2.");

    const query = server.messages.renderMessage(
      ctx,
      "pt",
      "tossup-winner",
      argumentsFromQuery(new URLSearchParams("player=Ana&score=340")),
    );
    assert.ok("data" in query && query.data.text === "Ana vence com 340 pontos!");
  }

  console.log("✓ render test passed");

  // render errors
  {
    const missingKey = server.messages.render(ctx, "pt", { key: "tossup-nope" });
    assert.ok("error" in missingKey);
    if ("error" in missingKey) {
      assert.equal(missingKey.error.code, "MISSING_KEY");
      assert.deepEqual(missingKey.error.details, [
        { field: "key", reason: "searched:pt>shared/pt>en>shared/en" },
      ]);
    }
    assert.equal(statusFor(missingKey), 404);

    const missingArg = server.messages.render(ctx, "en", { key: "tossup-bank", args: {} });
    assert.ok("error" in missingArg);
    if ("error" in missingArg) {
      assert.equal(missingArg.error.code, "MISSING_ARGUMENT");
      assert.deepEqual(missingArg.error.details, [{ field: "args.points", reason: "required" }]);
    }
    assert.equal(statusFor(missingArg), 422);

    const badArgs = server.messages.render(ctx, "en", { key: "tossup-bank", args: { points: {} } });
    assert.ok("error" in badArgs);
    if ("error" in badArgs) {
      assert.equal(badArgs.error.code, "VALIDATION_ERROR");
      assert.deepEqual(badArgs.error.details, [{ field: "args.points", reason: "unsupported_value" }]);
    }
    assert.equal(statusFor(badArgs), 400);

    const noKey = server.messages.render(ctx, "en", {});
    assert.ok("error" in noKey && noKey.error.code === "VALIDATION_ERROR");
  }

  console.log("✓ render error test passed");

  // locales / tables / validate
  {
    const locales = server.messages.listLocales(ctx);
    assert.deepEqual(locales.data, { locales: ["en", "pt"], tables: ["en", "pt", "shared/en"] });

    const tables = server.catalog.listTables(ctx);
    assert.deepEqual(tables.data.tables, [
      { tableId: "en", status: "ready", keys: 2 },
      { tableId: "pt", status: "ready", keys: 1 },
      { tableId: "shared/en", status: "ready", keys: 1 },
    ]);

    const validation = server.catalog.validate(ctx);
    assert.equal(validation.data.reference, "en");
    assert.equal(validation.data.issues.length, 1);
    assert.equal(validation.data.issues[0].message, `pt: missing "tossup-bank"`);
  }

  console.log("✓ catalog listing test passed");

  // reload
  {
    const editorCtx = { ...ctx, editorId: "editor-1", editorEmail: "editor@example.com" };

    const broken = await server.catalog.reloadTable(editorCtx, "pt", { source: "tossup-winner" });
    assert.ok("error" in broken);
    if ("error" in broken) {
      assert.equal(broken.error.code, "PARSE_ERROR");
      assert.deepEqual(broken.error.details, [{ field: "line:1", reason: "expected '<key> = <template>'" }]);
    }
    assert.equal(saved.length, 0);
    const stillOld = server.messages.render(ctx, "pt", { key: "tossup-winner", args: { player: "Ana", score: 1 } });
    assert.ok("data" in stillOld && stillOld.data.text === "Ana vence com 1 pontos!");

    const source = "tossup-winner = { $player } ganhou com { $score }!\ntossup-bank = Guardar { $points } pontos";
    const reloaded = await server.catalog.reloadTable(editorCtx, "pt", { source });
    assert.ok("data" in reloaded);
    if ("data" in reloaded) {
      assert.deepEqual(reloaded.data, { tableId: "pt", keys: 2 });
    }
    assert.deepEqual(saved, [{ layer: "tossup", locale: "pt", source }]);
    const fresh = server.messages.render(ctx, "pt", { key: "tossup-winner", args: { player: "Ana", score: 340 } });
    assert.ok("data" in fresh && fresh.data.text === "Ana ganhou com 340!");
    assert.deepEqual(server.catalog.validate(ctx).data.issues, []);

    const sharedFix = await server.catalog.reloadTable(editorCtx, "shared/pt", {
      source: "game-round-start = Rodada { $round }.",
    });
    assert.ok("data" in sharedFix);
    assert.equal(saved[1].layer, "shared");
    const round = server.messages.render(ctx, "pt", { key: "game-round-start", args: { round: 2 } });
    assert.ok("data" in round && round.data.text === "Rodada 2.");

    const badId = await server.catalog.reloadTable(editorCtx, "../etc", { source });
    assert.ok("error" in badId && badId.error.code === "VALIDATION_ERROR");
    const badLayer = await server.catalog.reloadTable(editorCtx, "poker/en", { source });
    assert.ok("error" in badLayer && badLayer.error.details?.[0].reason === "unknown_layer");
    const noSource = await server.catalog.reloadTable(editorCtx, "pt", {});
    assert.ok("error" in noSource && noSource.error.code === "VALIDATION_ERROR");
  }

  console.log("✓ reload test passed");

  // sync against an unavailable source
  {
    const offline: CatalogSourceProvider = {
      kind: "offline",
      async list() {
        throw new Error("connection refused");
      },
    };
    const other = createServer({ config: loadConfig({}), provider: offline });
    const out = await other.catalog.sync(ctx);
    assert.ok("error" in out);
    if ("error" in out) {
      assert.equal(out.error.code, "SOURCE_UNAVAILABLE");
      assert.equal(out.error.message, "catalog source offline is unavailable");
    }
    assert.equal(statusFor(out), 502);
  }

  console.log("✓ sync failure test passed");
  console.log("All tests passed!");
}

runTests().catch((err) => {
  console.error("Test failed:", err);
  process.exit(1);
});
