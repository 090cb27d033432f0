/**
 * Progress Store Interface
 *
 * 저장된 레코드 키 관리 + append-only 출력 로그
 * 출력 파일 자체가 재개 체크포인트 역할
 */

import type { BusinessRecord } from "@/core/domain/BusinessRecord";

/**
 * append 결과
 * - saved: 새로 기록됨
 * - duplicate: 이미 저장된 키 (no-op)
 * - failed: 쓰기 실패 (키 미등록, 이후 재시도 가능)
 */
export type AppendOutcome = "saved" | "duplicate" | "failed";

export interface IProgressStore {
  /**
   * 출력 파일을 읽어 저장된 키 집합 복원
   * 손상된 라인은 경고 후 건너뜀
   */
  load(): Promise<Set<string>>;

  contains(key: string): boolean;

  append(record: BusinessRecord): Promise<AppendOutcome>;

  /**
   * 현재 알려진 키 수
   */
  size(): number;
}
