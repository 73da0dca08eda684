/**
 * Dicehall – 카탈로그 편집자 인증
 *
 * 카탈로그를 바꾸는 요청(reload, sync)만 인증한다. 조회/렌더링은 공개.
 * Supabase JWT를 검증하고 app_metadata.role이 catalog_editor인지 확인한다.
 */
import type { DbAccessor } from "./db";

export const EDITOR_ROLE = "catalog_editor";

export interface AuthResult {
  userId: string;
  userEmail?: string;
}

export interface AuthError {
  code: "UNAUTHORIZED" | "FORBIDDEN";
  message: string;
}

/**
 * Authorization 헤더에서 Bearer 토큰을 추출한다.
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) return null;
  const parts = authHeader.split(" ");
  if (parts.length !== 2 || parts[0] !== "Bearer" || !parts[1]) return null;
  return parts[1];
}

/**
 * Bearer 토큰을 검증하고 편집자 정보를 반환한다.
 */
export async function verifyEditor(
  authHeader: string | undefined,
  getDb: DbAccessor,
): Promise<AuthResult | AuthError> {
  const token = extractBearerToken(authHeader);

  if (!token) {
    return { code: "UNAUTHORIZED", message: "Missing or invalid Authorization header" };
  }

  try {
    const { data, error } = await getDb().auth.getUser(token);

    if (error || !data.user) {
      return { code: "UNAUTHORIZED", message: "Invalid or expired token" };
    }
    if (data.user.app_metadata.role !== EDITOR_ROLE) {
      return { code: "FORBIDDEN", message: `Role ${EDITOR_ROLE} is required to change catalogs` };
    }

    return {
      userId: data.user.id,
      userEmail: data.user.email,
    };
  } catch (error) {
    console.error("[auth] token verification failed:", error);
    return { code: "UNAUTHORIZED", message: "Token verification failed" };
  }
}

/**
 * 인증 결과가 에러인지 확인하는 타입 가드
 */
export function isAuthError(result: AuthResult | AuthError): result is AuthError {
  return "code" in result;
}
