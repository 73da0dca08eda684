/**
 * Dicehall – Supabase 클라이언트
 *
 * 접속 정보는 ServerConfig에서 받는다. 클라이언트는 처음 쓸 때 만든다
 * (files 공급자만 쓰고 편집 API를 부르지 않으면 Supabase 설정 없이도 뜬다).
 */
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { ServerConfig } from "./config";

export type SupabaseSettings = Pick<ServerConfig, "supabaseUrl" | "supabaseServiceRoleKey">;

export type DbAccessor = () => SupabaseClient;

export function createDbAccessor(settings: SupabaseSettings): DbAccessor {
  let client: SupabaseClient | null = null;

  return function getDb() {
    if (client) return client;

    const { supabaseUrl, supabaseServiceRoleKey } = settings;
    if (!supabaseUrl || !supabaseServiceRoleKey) {
      throw new Error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are not configured");
    }

    // 서버 전용 service_role 키. 세션은 저장하지 않는다
    client = createClient(supabaseUrl, supabaseServiceRoleKey, {
      auth: { autoRefreshToken: false, persistSession: false },
    });
    return client;
  };
}
