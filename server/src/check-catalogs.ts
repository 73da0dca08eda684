/**
 * 카탈로그 점검 스크립트
 *
 *   npm run check:catalogs [-- --placeholders]
 *
 * 설정된 원문 공급자에서 전체 테이블을 읽어 파싱 오류와 키 누락 경고를 출력한다.
 * 파싱 오류가 있으면 exit 1, 경고만 있으면 exit 0.
 */
import { checkSchema } from "../../src/games/schema";
import { TOSSUP_SCHEMA } from "../../src/games/tossup/messages";
import { createConfiguredResolver, syncCatalog, type SyncReport } from "./catalog";
import { loadConfig, loadEnvFiles, type ServerConfig } from "./config";
import { createProvider } from "./index";

export function formatReport(report: SyncReport, schemaWarnings: string[]): string[] {
  const lines: string[] = [`source: ${report.source}`, `loaded: ${report.loaded.join(", ") || "-"}`];
  if (report.skipped.length > 0) lines.push(`skipped: ${report.skipped.join(", ")}`);
  for (const failure of report.failed) {
    const key = failure.key ? ` (${failure.key})` : "";
    lines.push(`error ${failure.tableId}:${failure.line}${key} ${failure.reason}`);
  }
  for (const issue of report.issues) {
    lines.push(`warning ${issue.message}`);
  }
  for (const message of schemaWarnings) {
    lines.push(`warning ${message}`);
  }
  return lines;
}

export async function checkCatalogs(config: ServerConfig, placeholders: boolean) {
  // 경고는 보고서로 모아서 한 번에 출력한다
  const resolver = createConfiguredResolver(config, () => undefined);
  const report = await syncCatalog(resolver, createProvider(config), config);
  if (placeholders) {
    report.issues = resolver.validate(config.referenceLocale, { placeholders: true });
  }

  const schemaWarnings: string[] = [];
  if (config.moduleLayer === "tossup") {
    for (const locale of [...resolver.listLocales()].sort()) {
      for (const issue of checkSchema(resolver, locale, TOSSUP_SCHEMA)) {
        schemaWarnings.push(issue.message);
      }
    }
  }

  return { report, lines: formatReport(report, schemaWarnings) };
}

if (process.argv[1]?.endsWith("check-catalogs.ts")) {
  loadEnvFiles();
  checkCatalogs(loadConfig(), process.argv.includes("--placeholders"))
    .then(({ report, lines }) => {
      process.stdout.write(`${lines.join("\n")}\n`);
      process.exitCode = report.failed.length > 0 ? 1 : 0;
    })
    .catch((error: unknown) => {
      console.error("[check-catalogs] failed:", error);
      process.exitCode = 1;
    });
}
