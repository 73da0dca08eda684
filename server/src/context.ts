/**
 * Dicehall – 요청 컨텍스트 공통 인터페이스
 */
export interface RequestContext {
  requestId: string;
  nowIso: string;
  /** 카탈로그 변경 요청에서만 채워진다 (Bearer 토큰 검증 후) */
  editorId?: string;
  editorEmail?: string;
}
