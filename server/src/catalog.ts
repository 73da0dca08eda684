/**
 * Dicehall – 서버용 카탈로그 구성
 *
 * 설정으로 resolver를 만들고, 원문 공급자에서 전체 테이블을 다시 읽어 들인다.
 * 테이블 하나가 파싱에 실패해도 나머지 테이블은 그대로 반영된다.
 */
import type { ValidationIssue } from "../../src/catalog/errors";
import { createIntlFormatter, createJoinFormatter, type ArgumentFormatter } from "../../src/catalog/format";
import {
  createCatalogResolver,
  layeredChain,
  tableId,
  type CatalogResolver,
} from "../../src/catalog/resolver";
import type { CatalogSourceEntry, CatalogSourceProvider } from "./catalog-source";
import type { ServerConfig } from "./config";

export interface SyncFailure {
  tableId: string;
  line: number;
  key: string | null;
  reason: string;
}

export interface SyncReport {
  source: string;
  loaded: string[];
  skipped: string[];
  failed: SyncFailure[];
  issues: ValidationIssue[];
}

export function logIssue(issue: ValidationIssue) {
  console.warn(`[catalog] ${issue.message}`);
}

export function createConfiguredFormatter(
  config: Pick<ServerConfig, "listFormat" | "listSeparators">,
): ArgumentFormatter {
  return config.listFormat === "intl"
    ? createIntlFormatter()
    : createJoinFormatter({ listSeparators: config.listSeparators });
}

export function createConfiguredResolver(
  config: ServerConfig,
  onIssue: (issue: ValidationIssue) => void = logIssue,
): CatalogResolver {
  return createCatalogResolver({
    defaultLocale: config.defaultLocale,
    fallbacks: (locale) =>
      layeredChain(locale, {
        layers: config.sharedLayers,
        defaultLocale: config.defaultLocale,
        overrides: config.localeFallbacks,
      }),
    missingKey: config.missingKey,
    formatter: createConfiguredFormatter(config),
    onIssue,
  });
}

/**
 * 모듈 레이어는 접두사 없는 locale id, 공용 레이어는 "<layer>/<locale>".
 * 이 서비스와 무관한 레이어면 null.
 */
export function tableIdForEntry(
  entry: Pick<CatalogSourceEntry, "layer" | "locale">,
  config: Pick<ServerConfig, "moduleLayer" | "sharedLayers">,
): string | null {
  if (entry.layer === config.moduleLayer) return tableId(entry.locale);
  if (config.sharedLayers.includes(entry.layer)) return tableId(entry.locale, entry.layer);
  return null;
}

export async function syncCatalog(
  resolver: CatalogResolver,
  provider: CatalogSourceProvider,
  config: ServerConfig,
): Promise<SyncReport> {
  const entries = await provider.list();
  const loaded: string[] = [];
  const skipped: string[] = [];
  const failed: SyncFailure[] = [];

  await Promise.all(
    entries.map(async (entry) => {
      const id = tableIdForEntry(entry, config);
      if (!id) {
        skipped.push(`${entry.layer}/${entry.locale}`);
        return;
      }
      const out = await resolver.loadFrom(id, async () => entry.source);
      if ("error" in out) {
        console.error(`[catalog] ${out.error.message}`);
        failed.push({
          tableId: id,
          line: out.error.line,
          key: out.error.key ?? null,
          reason: out.error.reason,
        });
        return;
      }
      loaded.push(id);
    }),
  );

  return {
    source: provider.kind,
    loaded: loaded.sort(),
    skipped: skipped.sort(),
    failed: failed.sort((a, b) => a.tableId.localeCompare(b.tableId)),
    issues: resolver.validate(config.referenceLocale),
  };
}
