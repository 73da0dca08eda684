/**
 * Dicehall 카탈로그 서버 엔트리
 *
 * resolver는 여기서 한 번 만들어 라우트에 명시적으로 넘긴다 (전역 싱글톤 없음).
 */
import type { CatalogResolver } from "../../src/catalog/resolver";
import { verifyEditor, type AuthError, type AuthResult } from "./auth";
import { createConfiguredResolver, syncCatalog, type SyncReport } from "./catalog";
import {
  createFileSource,
  createSupabaseSource,
  type CatalogSourceProvider,
} from "./catalog-source";
import { loadConfig, type ServerConfig } from "./config";
import type { RequestContext } from "./context";
import { createDbAccessor, type DbAccessor } from "./db";
import { registerCatalogRoutes } from "./routes/catalog";
import { registerMessageRoutes } from "./routes/messages";

export type EditorAuthorizer = (authHeader: string | undefined) => Promise<AuthResult | AuthError>;

export interface CreateServerOptions {
  config?: ServerConfig;
  provider?: CatalogSourceProvider;
  resolver?: CatalogResolver;
  /** 편집자 인증. 기본은 Supabase 토큰 검증 */
  authorize?: EditorAuthorizer;
}

export function createProvider(
  config: ServerConfig,
  getDb: DbAccessor = createDbAccessor(config),
): CatalogSourceProvider {
  return config.catalogSource === "supabase"
    ? createSupabaseSource(getDb)
    : createFileSource(config.catalogDir);
}

export function createServer(options: CreateServerOptions = {}) {
  const config = options.config ?? loadConfig();
  const getDb = createDbAccessor(config);
  const provider = options.provider ?? createProvider(config, getDb);
  const authorize: EditorAuthorizer =
    options.authorize ?? ((authHeader) => verifyEditor(authHeader, getDb));
  const resolver = options.resolver ?? createConfiguredResolver(config);
  const messages = registerMessageRoutes(resolver);
  const catalog = registerCatalogRoutes({ resolver, provider, config });

  /**
   * 시작 시 전체 카탈로그 로드. 파싱 실패 테이블은 보고만 하고 계속 진행한다.
   */
  async function init(): Promise<SyncReport> {
    const report = await syncCatalog(resolver, provider, config);
    process.stdout.write(
      `[catalog] ${report.loaded.length} tables from ${report.source}, ` +
        `${report.failed.length} failed, ${report.issues.length} warnings\n`,
    );
    return report;
  }

  function createContext(requestId: string, nowIso = new Date().toISOString()): RequestContext {
    return { requestId, nowIso };
  }

  return {
    health() {
      return { ok: true, tables: resolver.listTables().length };
    },
    config,
    resolver,
    messages,
    catalog,
    init,
    authorize,
    createContext,
  };
}

export type CatalogServer = ReturnType<typeof createServer>;
