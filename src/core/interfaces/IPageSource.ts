/**
 * Page Source Interface
 *
 * 결과 테이블 행 조회 및 페이지 이동을 제공하는 외부 협력자
 * 렌더링 방식(브라우저, HTTP 등)은 구현체에 위임
 */

/**
 * 한 행의 셀 텍스트 (순서 유지)
 */
export type RawRow = readonly string[];

export interface IPageSource {
  /**
   * 세션 생성 (브라우저 실행 + 대상 페이지 이동)
   * 실패 시 throw → 실행 중단
   */
  open(): Promise<void>;

  /**
   * 현재 페이지의 모든 결과 행 조회
   * @param timeoutMs 행이 나타날 때까지 대기할 최대 시간
   * @throws PageTimeoutError 제한 시간 내에 행이 없을 때
   */
  fetchCurrentRows(timeoutMs: number): Promise<RawRow[]>;

  /**
   * 다음 페이지 버튼 존재 + 활성 여부
   */
  hasNextPage(): Promise<boolean>;

  /**
   * 다음 페이지로 이동
   * @returns 이동 요청 성공 여부
   */
  advancePage(): Promise<boolean>;

  /**
   * 세션 정리 (여러 번 호출해도 안전)
   */
  close(): Promise<void>;
}

/**
 * Readiness Gate Interface
 *
 * 결과 화면이 준비될 때까지 대기하는 외부 동기화 지점
 * (사람이 reCAPTCHA 를 풀고 검색을 실행하는 단계)
 */
export interface IReadinessGate {
  /**
   * @returns 준비 완료 시 true, 준비 신호 없이 종료되면 false
   */
  waitUntilReady(): Promise<boolean>;
}
