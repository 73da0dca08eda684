/**
 * Dicehall 카탈로그 서버 설정
 *
 * 환경변수에서 읽는다. 목록형 값은 다음 형식을 쓴다.
 *   LOCALE_FALLBACKS="pt-BR:pt,en;zh-TW:zh-CN"
 *   LIST_SEPARATORS="zh-CN:、;pt: e "
 *   MISSING_KEY_POLICY="error" | "key" | "text:<대체 문구>"
 *   LIST_FORMAT="join" | "intl"
 */
import { readFileSync } from "node:fs";
import nodePath from "node:path";
import { fileURLToPath } from "node:url";
import type { MissingKeyPolicy } from "../../src/catalog/resolver";

export type CatalogSourceKind = "files" | "supabase";
/** join: LIST_SEPARATORS 구분자로 연결, intl: Intl.ListFormat ("Ana and Bia") */
export type ListFormatKind = "join" | "intl";

export interface ServerConfig {
  port: number;
  catalogSource: CatalogSourceKind;
  catalogDir: string;
  /** 이 서비스가 담당하는 게임 모듈 레이어 (테이블 id에 접두사 없음) */
  moduleLayer: string;
  /** 모듈 테이블 아래에 깔리는 공용 레이어 */
  sharedLayers: string[];
  defaultLocale: string;
  referenceLocale: string;
  localeFallbacks: Record<string, string[]>;
  listFormat: ListFormatKind;
  listSeparators: Record<string, string>;
  missingKey: MissingKeyPolicy;
  supabaseUrl?: string;
  supabaseServiceRoleKey?: string;
}

const currentDir = nodePath.dirname(fileURLToPath(import.meta.url));
export const DEFAULT_CATALOG_DIR = nodePath.resolve(currentDir, "../../locales");

// 중국어는 열거에 모점(、)을 쓴다. 나머지는 기본 ", "
const DEFAULT_LIST_SEPARATORS: Record<string, string> = { zh: "、" };

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);
}

/**
 * "a:x,y;b:z" → { a: "x,y", b: "z" }
 */
function parsePairs(value: string | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  if (!value) return out;
  for (const entry of value.split(";")) {
    const colon = entry.indexOf(":");
    if (colon === -1) continue;
    const key = entry.slice(0, colon).trim();
    if (key) out[key] = entry.slice(colon + 1);
  }
  return out;
}

/**
 * .env 파일에서 환경변수를 로드한다 (dotenv 없이 직접 파싱).
 * 이미 설정된 변수는 덮어쓰지 않는다.
 */
export function loadEnvFile(filename: string) {
  const filePath = nodePath.resolve(process.cwd(), filename);
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch {
    // 파일이 없으면 무시 (production에서는 시스템 환경변수 사용)
    return;
  }
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIndex = trimmed.indexOf("=");
    if (eqIndex === -1) continue;
    const key = trimmed.slice(0, eqIndex).trim();
    const value = trimmed.slice(eqIndex + 1).trim();
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}

export function loadEnvFiles(appEnv = process.env.APP_ENV ?? "dev") {
  loadEnvFile(`.env.${appEnv === "dev" ? "development" : appEnv}`);
  loadEnvFile(".env");
}

export function parseMissingKeyPolicy(value: string | undefined): MissingKeyPolicy {
  if (!value || value === "error") return "error";
  if (value === "key") return "key";
  if (value.startsWith("text:")) return { text: value.slice("text:".length) };
  throw new Error(`MISSING_KEY_POLICY must be "error", "key" or "text:<text>", got "${value}"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const source = env.CATALOG_SOURCE ?? "files";
  if (source !== "files" && source !== "supabase") {
    throw new Error(`CATALOG_SOURCE must be "files" or "supabase", got "${source}"`);
  }

  const port = Number(env.PORT ?? 8080);
  if (!Number.isInteger(port) || port < 0) {
    throw new Error(`PORT must be an integer, got "${env.PORT}"`);
  }

  const supabaseUrl = env.SUPABASE_URL || undefined;
  const supabaseServiceRoleKey = env.SUPABASE_SERVICE_ROLE_KEY || undefined;
  if (source === "supabase" && (!supabaseUrl || !supabaseServiceRoleKey)) {
    throw new Error("CATALOG_SOURCE=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY");
  }

  const listFormat = env.LIST_FORMAT ?? "join";
  if (listFormat !== "join" && listFormat !== "intl") {
    throw new Error(`LIST_FORMAT must be "join" or "intl", got "${listFormat}"`);
  }

  const defaultLocale = env.DEFAULT_LOCALE ?? "en";
  const localeFallbacks: Record<string, string[]> = {};
  for (const [locale, list] of Object.entries(parsePairs(env.LOCALE_FALLBACKS))) {
    localeFallbacks[locale] = parseList(list);
  }

  return {
    port,
    catalogSource: source,
    catalogDir: env.CATALOG_DIR ? nodePath.resolve(env.CATALOG_DIR) : DEFAULT_CATALOG_DIR,
    moduleLayer: env.CATALOG_MODULE ?? "tossup",
    sharedLayers: env.CATALOG_SHARED_LAYERS === undefined ? ["shared"] : parseList(env.CATALOG_SHARED_LAYERS),
    defaultLocale,
    referenceLocale: env.REFERENCE_LOCALE ?? defaultLocale,
    localeFallbacks,
    listFormat,
    listSeparators:
      env.LIST_SEPARATORS === undefined ? { ...DEFAULT_LIST_SEPARATORS } : parsePairs(env.LIST_SEPARATORS),
    missingKey: parseMissingKeyPolicy(env.MISSING_KEY_POLICY),
    supabaseUrl,
    supabaseServiceRoleKey,
  };
}
