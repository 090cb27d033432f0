/**
 * 애플리케이션 설정 상수
 *
 * 기본값만 정의하며, 환경변수 오버라이드는 ConfigLoader 에서 적용한다.
 */

/**
 * 추출 기본 설정
 */
export const EXTRACTION_DEFAULTS = {
  /** 출력 JSONL 파일 (재개 체크포인트 겸용) */
  OUTPUT_FILE: "output.jsonl",

  /** 행 조회 최대 시도 횟수 */
  MAX_ATTEMPTS: 3,

  /** 타임아웃 후 재시도 전 대기 (ms) */
  RETRY_WAIT_MS: 2000,

  /** 결과 테이블 행 대기 타임아웃 (ms) */
  ROW_TIMEOUT_MS: 30000,

  /** 페이지 간 대기 하한 (ms, 포함) */
  PACING_MIN_MS: 2000,

  /** 페이지 간 대기 상한 (ms, 미포함) */
  PACING_MAX_MS: 4000,

  /** 최대 처리 페이지 수 (0 = 제한 없음) */
  MAX_PAGES: 0,

  /** 기본 수집 대상 프로필 */
  SOURCE_PROFILE: "registry",
} as const;

/**
 * 레코드 매핑 상수
 */
export const RECORD_CONFIG = {
  /** 누락된 컬럼 기본값 */
  MISSING_VALUE: "N/A",

  /** 5번째 이후 컬럼 결합 구분자 */
  AGENT_SEPARATOR: " | ",

  /** agent_name / agent_address / agent_email 세분화 최소 컬럼 수 */
  REFINED_AGENT_MIN_CELLS: 7,
} as const;

/**
 * 로깅 설정
 */
export const LOG_CONFIG = {
  SERVICE_NAME: "registry_extractor",
  FILE_PREFIX: "extractor",
  MAX_FILES: 90,
  MAX_SIZE: "100M",
} as const;

/**
 * 파일 경로 설정
 */
export const PATH_CONFIG = {
  /**
   * 수집 대상 프로필 디렉토리
   * ConfigLoader 가 YAML 파일을 읽는 기준 경로 (__dirname 기준)
   */
  SOURCES_DIR: "sources",
} as const;

/**
 * 종료 코드
 */
export const EXIT_CODES = {
  DONE: 0,
  FAILED: 1,
  SIGINT: 130,
  SIGTERM: 143,
} as const;
