/**
 * 메시지 렌더링 / locale 조회
 * POST /api/v1/messages/:locale/render   { key, args }
 * GET  /api/v1/messages/:locale/:key?name=value&list=a&list=b
 * GET  /api/v1/locales
 */
import {
  fail,
  ok,
  type ApiError,
  type ApiResult,
  type ApiSuccess,
  type ErrorDetail,
} from "../../../src/api/contract";
import { MissingKeyError, type ResolutionError, type Result } from "../../../src/catalog/errors";
import type { ArgumentValue, RenderArguments } from "../../../src/catalog/format";
import type { CatalogResolver } from "../../../src/catalog/resolver";
import type { RequestContext } from "../context";

export interface RenderedMessage {
  locale: string;
  key: string;
  text: string;
}

function isArgumentValue(value: unknown): value is ArgumentValue {
  if (typeof value === "string") return true;
  if (typeof value === "number") return Number.isFinite(value);
  return (
    Array.isArray(value) &&
    value.every((item) => typeof item === "string" || (typeof item === "number" && Number.isFinite(item)))
  );
}

/**
 * 요청 본문의 args 객체를 검증한다. 허용 값: 문자열, 숫자, 문자열/숫자 배열.
 */
export function parseRenderArguments(value: unknown): Result<RenderArguments, ErrorDetail[]> {
  if (value === undefined || value === null) return { data: {} };
  if (typeof value !== "object" || Array.isArray(value)) {
    return { error: [{ field: "args", reason: "must_be_object" }] };
  }

  const args: Record<string, ArgumentValue> = {};
  const details: ErrorDetail[] = [];
  for (const [name, arg] of Object.entries(value)) {
    if (isArgumentValue(arg)) {
      args[name] = arg;
    } else {
      details.push({ field: `args.${name}`, reason: "unsupported_value" });
    }
  }
  return details.length > 0 ? { error: details } : { data: args };
}

/**
 * 쿼리스트링 → 인자. 같은 이름이 반복되면 목록 인자가 된다.
 */
export function argumentsFromQuery(params: URLSearchParams): RenderArguments {
  const args: Record<string, ArgumentValue> = {};
  for (const name of new Set(params.keys())) {
    const values = params.getAll(name);
    args[name] = values.length > 1 ? values : values[0];
  }
  return args;
}

export function resolutionFailure(requestId: string, error: ResolutionError): ApiError {
  if (error instanceof MissingKeyError) {
    return fail(requestId, "MISSING_KEY", error.message, [
      { field: "key", reason: `searched:${error.searched.join(">")}` },
    ]);
  }
  return fail(requestId, "MISSING_ARGUMENT", error.message, [
    { field: `args.${error.placeholder}`, reason: "required" },
  ]);
}

export function registerMessageRoutes(resolver: CatalogResolver) {
  function renderMessage(
    ctx: RequestContext,
    locale: string,
    key: string,
    args: RenderArguments,
  ): ApiResult<RenderedMessage> {
    const out = resolver.resolve(locale, key, args);
    if ("error" in out) {
      return resolutionFailure(ctx.requestId, out.error);
    }
    return ok(ctx.requestId, { locale, key, text: out.data });
  }

  function render(
    ctx: RequestContext,
    locale: string,
    input: { key?: unknown; args?: unknown },
  ): ApiResult<RenderedMessage> {
    if (typeof input.key !== "string" || input.key === "") {
      return fail(ctx.requestId, "VALIDATION_ERROR", "key is required", [
        { field: "key", reason: "required" },
      ]);
    }
    const args = parseRenderArguments(input.args);
    if ("error" in args) {
      return fail(ctx.requestId, "VALIDATION_ERROR", "invalid render arguments", args.error);
    }
    return renderMessage(ctx, locale, input.key, args.data);
  }

  function listLocales(ctx: RequestContext): ApiSuccess<{ locales: string[]; tables: string[] }> {
    return ok(ctx.requestId, {
      locales: [...resolver.listLocales()].sort(),
      tables: resolver.listTables(),
    });
  }

  return { render, renderMessage, listLocales };
}
