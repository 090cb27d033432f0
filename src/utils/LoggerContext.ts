/**
 * 로거 컨텍스트 유틸리티
 */

import { logger, type Logger } from "@/config/logger";

/**
 * 실행 단위 로거 생성
 * @param runId - 실행 ID (uuid v7)
 * @param profile - 수집 대상 프로필 이름
 */
export function createRunLogger(runId: string, profile: string): Logger {
  return logger.child({
    run_id: runId,
    profile,
  });
}

/**
 * 중요 정보 로깅 (pretty 콘솔에서 ⭐ 표시)
 */
export function logImportant(
  target: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  target.info({ ...data, important: true }, message);
}
