/**
 * Business Record 도메인 모델
 *
 * 결과 테이블의 한 행을 구조화한 레코드
 * - business_name: 중복 제거 키 (필수, 비어 있지 않음)
 * - 누락 컬럼은 "N/A"
 * - agent_name / agent_address / agent_email 은 7컬럼 이상인 행에만 존재
 */

import { z } from "zod";

export interface BusinessRecord {
  /** 상호명 (중복 제거 키) */
  business_name: string;
  /** 등록 번호 */
  registration_id: string;
  /** 상태 */
  status: string;
  /** 등록일 */
  filing_date: string;
  /** 5번째 이후 컬럼 결합값 (" | " 구분) */
  agent_details: string;
  agent_name?: string;
  agent_address?: string;
  agent_email?: string;
}

/**
 * 출력 파일 라인 검증 스키마
 * 재개 시에는 키만 필요하므로 business_name 외 필드는 그대로 통과
 */
export const PersistedRecordSchema = z
  .object({
    business_name: z.string().min(1),
  })
  .passthrough();

export type PersistedRecord = z.infer<typeof PersistedRecordSchema>;

/**
 * 레코드 직렬화 (JSONL 한 줄, 개행 미포함)
 */
export function serializeRecord(record: BusinessRecord): string {
  return JSON.stringify(record);
}
