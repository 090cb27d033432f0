/**
 * Extraction 상태 머신 정의
 *
 * GATED → FETCHING → EXTRACTING → PAGINATING → FETCHING ...
 *                ↘ DONE                    ↘ DONE
 * GATED → FAILED (세션 생성 실패) / 루프 중 미분류 에러 → FAILED
 */

export type ExtractionState =
  | "GATED"
  | "FETCHING"
  | "EXTRACTING"
  | "PAGINATING"
  | "DONE"
  | "FAILED";

export type TerminalState = Extract<ExtractionState, "DONE" | "FAILED">;

/**
 * 종료 사유
 */
export type TerminationReason =
  /** 재시도 후에도 행 없음 (마지막 페이지로 간주) */
  | "no_rows"
  /** 다음 페이지 버튼 없음 / 비활성 */
  | "no_next_page"
  /** advancePage() 가 false 반환 */
  | "advance_rejected"
  /** 페이지네이션 조회/클릭 중 에러 */
  | "pagination_error"
  /** MAX_PAGES 도달 */
  | "max_pages"
  /** 준비 신호 거부 (stdin 종료 등) */
  | "gate_declined"
  /** PageSource 세션 생성 실패 */
  | "session_failed"
  /** 루프 중 미분류 에러 */
  | "fatal_error";

/**
 * 실행 요약
 */
export interface ExtractionSummary {
  state: TerminalState;
  termination: TerminationReason;
  /** 추출까지 완료한 페이지 수 */
  pagesProcessed: number;
  /** 조회된 전체 행 수 */
  rowsSeen: number;
  /** 새로 저장된 레코드 수 */
  recordsSaved: number;
  /** 이미 저장되어 있어 건너뛴 레코드 수 */
  duplicatesSkipped: number;
  /** 파싱 불가로 건너뛴 행 수 */
  rowsSkipped: number;
  /** 저장 실패 레코드 수 */
  saveFailures: number;
  /** 종료 시점의 전체 키 수 (기존 + 신규) */
  knownRecords: number;
  durationMs: number;
  /** FAILED 인 경우 에러 메시지 */
  error?: string;
}
