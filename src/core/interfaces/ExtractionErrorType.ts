/**
 * Extraction Error Type
 *
 * 목적:
 * - 실패 원인 분류
 * - 분류별 로그 레벨 / 복구 정책 결정
 *
 * 복구 정책:
 * - PAGE_TIMEOUT: RetryPolicy 에서 재시도, 소진 시 빈 결과
 * - MALFORMED_ROW / OUTPUT_IO: 해당 행/레코드만 건너뜀
 * - PAGINATION: 페이지네이션 완료로 간주 (DONE)
 * - SESSION_INIT / UNKNOWN: 실행 중단 (FAILED)
 */

export enum ExtractionErrorType {
  /** 결과 테이블 로딩 타임아웃 */
  PAGE_TIMEOUT = "PAGE_TIMEOUT",

  /** 브라우저 세션 생성 실패 */
  SESSION_INIT = "SESSION_INIT",

  /** 다음 페이지 버튼 조회/클릭 실패 */
  PAGINATION = "PAGINATION",

  /** 출력 파일 쓰기 실패 */
  OUTPUT_IO = "OUTPUT_IO",

  /** 행 파싱 실패 */
  MALFORMED_ROW = "MALFORMED_ROW",

  /** 설정 오류 */
  CONFIG = "CONFIG",

  /** 알 수 없는 에러 */
  UNKNOWN = "UNKNOWN",
}

/**
 * Extraction Error 클래스
 */
export class ExtractionError extends Error {
  public readonly type: ExtractionErrorType;
  public readonly page?: number;
  public readonly retryable: boolean;
  public readonly errorCause?: unknown;

  constructor(
    type: ExtractionErrorType,
    message: string,
    options?: {
      page?: number;
      retryable?: boolean;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = "ExtractionError";
    this.type = type;
    this.page = options?.page;
    this.retryable = options?.retryable ?? false;
    this.errorCause = options?.cause;
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      message: this.message,
      page: this.page,
      retryable: this.retryable,
      cause: describeError(this.errorCause),
    };
  }

  /**
   * 임의의 에러를 ExtractionError 로 감싸기 (이미 ExtractionError 면 그대로)
   */
  static wrap(
    error: unknown,
    type: ExtractionErrorType,
    message: string,
    page?: number,
  ): ExtractionError {
    if (error instanceof ExtractionError) return error;
    return new ExtractionError(type, `${message}: ${describeError(error)}`, {
      page,
      cause: error,
    });
  }
}

/**
 * 결과 테이블이 제한 시간 내에 나타나지 않음 (재시도 대상)
 */
export class PageTimeoutError extends ExtractionError {
  constructor(message: string, options?: { page?: number; cause?: unknown }) {
    super(ExtractionErrorType.PAGE_TIMEOUT, message, {
      ...options,
      retryable: true,
    });
    this.name = "PageTimeoutError";
  }
}

/**
 * 설정 파일 / 환경변수 검증 실패
 */
export class ConfigError extends ExtractionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ExtractionErrorType.CONFIG, message, options);
    this.name = "ConfigError";
  }
}

/**
 * 에러 메시지 추출 (Error 가 아니면 문자열 변환)
 */
export function describeError(error: unknown): string | undefined {
  if (error === undefined) return undefined;
  return error instanceof Error ? error.message : String(error);
}
