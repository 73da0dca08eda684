/**
 * 카탈로그 관리
 * GET  /api/v1/catalog/tables
 * GET  /api/v1/catalog/validate?reference=en&placeholders=true
 * PUT  /api/v1/catalog/:tableId   { source }   (편집자 인증)
 * POST /api/v1/catalog/sync                    (편집자 인증)
 */
import { fail, ok, type ApiResult, type ApiSuccess } from "../../../src/api/contract";
import { ParseError, type ValidationIssue } from "../../../src/catalog/errors";
import { parseMessageTable } from "../../../src/catalog/parser";
import { splitTableId, type CatalogResolver, type TableStatus } from "../../../src/catalog/resolver";
import { syncCatalog, type SyncReport } from "../catalog";
import type { CatalogSourceProvider } from "../catalog-source";
import type { ServerConfig } from "../config";
import type { RequestContext } from "../context";

export interface TableSummary {
  tableId: string;
  status: TableStatus;
  keys: number;
}

export interface CatalogRouteDeps {
  resolver: CatalogResolver;
  provider: CatalogSourceProvider;
  config: ServerConfig;
}

const TABLE_ID_PATTERN = /^(?:[a-z][a-z0-9_-]*\/)?[A-Za-z]{2,3}(?:-[A-Za-z0-9]{2,8})*$/;

export function registerCatalogRoutes({ resolver, provider, config }: CatalogRouteDeps) {
  function listTables(ctx: RequestContext): ApiSuccess<{ tables: TableSummary[] }> {
    const tables = resolver.listTables().map((tableId) => ({
      tableId,
      status: resolver.status(tableId),
      keys: resolver.getTable(tableId)?.entries.size ?? 0,
    }));
    return ok(ctx.requestId, { tables });
  }

  function validate(
    ctx: RequestContext,
    reference?: string,
    placeholders = false,
  ): ApiSuccess<{ reference: string; issues: ValidationIssue[] }> {
    const referenceLocale = reference || config.referenceLocale;
    const issues = resolver.validate(referenceLocale, { placeholders });
    return ok(ctx.requestId, { reference: referenceLocale, issues });
  }

  /**
   * 테이블 하나를 새 원문으로 교체한다.
   * 파싱 실패면 저장도 교체도 하지 않는다.
   */
  async function reloadTable(
    ctx: RequestContext,
    tableId: string,
    input: { source?: unknown },
  ): Promise<ApiResult<{ tableId: string; keys: number }>> {
    if (!TABLE_ID_PATTERN.test(tableId)) {
      return fail(ctx.requestId, "VALIDATION_ERROR", "invalid table id", [
        { field: "tableId", reason: "format" },
      ]);
    }
    if (typeof input.source !== "string") {
      return fail(ctx.requestId, "VALIDATION_ERROR", "source is required", [
        { field: "source", reason: "required" },
      ]);
    }
    const source = input.source;
    const { layer, locale } = splitTableId(tableId);
    if (layer && !config.sharedLayers.includes(layer)) {
      return fail(ctx.requestId, "VALIDATION_ERROR", `layer ${layer} is not served here`, [
        { field: "tableId", reason: "unknown_layer" },
      ]);
    }

    try {
      parseMessageTable(source, tableId);
    } catch (error) {
      if (error instanceof ParseError) {
        return fail(ctx.requestId, "PARSE_ERROR", error.message, [
          { field: `line:${error.line}`, reason: error.reason },
        ]);
      }
      throw error;
    }

    try {
      const out = await resolver.loadFrom(tableId, async () => {
        await provider.save?.({ layer: layer ?? config.moduleLayer, locale, source });
        return source;
      });
      if ("error" in out) {
        return fail(ctx.requestId, "PARSE_ERROR", out.error.message);
      }
    } catch (error) {
      console.error(`[catalog] reload ${tableId} failed:`, error);
      return fail(ctx.requestId, "SOURCE_UNAVAILABLE", `could not store ${tableId}`);
    }

    process.stdout.write(`[catalog] ${tableId} reloaded by ${ctx.editorEmail ?? ctx.editorId ?? "unknown"}\n`);
    return ok(ctx.requestId, {
      tableId,
      keys: resolver.getTable(tableId)?.entries.size ?? 0,
    });
  }

  async function sync(ctx: RequestContext): Promise<ApiResult<SyncReport>> {
    try {
      return ok(ctx.requestId, await syncCatalog(resolver, provider, config));
    } catch (error) {
      console.error("[catalog] sync failed:", error);
      return fail(ctx.requestId, "SOURCE_UNAVAILABLE", `catalog source ${provider.kind} is unavailable`);
    }
  }

  return { listTables, validate, reloadTable, sync };
}
