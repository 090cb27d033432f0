/**
 * Retry Policy
 *
 * 결과 테이블 행 조회 재시도
 * - 비어 있지 않은 결과를 얻으면 즉시 반환
 * - 타임아웃(PageTimeoutError): 대기 후 재시도
 * - 빈 결과: 바로 재시도 (구현체가 이미 타임아웃만큼 대기함)
 * - 모두 소진: 빈 배열 반환 (호출 측은 "데이터 없음"으로 해석)
 * - 그 외 에러는 그대로 전파
 */

import { logger as defaultLogger, type Logger } from "@/config/logger";
import type { RetryConfig } from "@/core/domain/ExtractionConfig";
import type { IPageSource, RawRow } from "@/core/interfaces/IPageSource";
import {
  ConfigError,
  PageTimeoutError,
} from "@/core/interfaces/ExtractionErrorType";
import { sleep as defaultSleep, type SleepFn } from "@/utils/sleep";

export type RowFetcher = Pick<IPageSource, "fetchCurrentRows">;

export class RetryPolicy {
  constructor(
    private readonly config: RetryConfig,
    private readonly logger: Logger = defaultLogger,
    private readonly sleep: SleepFn = defaultSleep,
  ) {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new ConfigError(
        `retry.maxAttempts must be a positive integer (got ${config.maxAttempts})`,
      );
    }
  }

  /**
   * 행 조회 (재시도 포함)
   * @param overrides 호출 단위 시도 횟수 / 대기 시간 변경
   */
  async fetchRows(
    source: RowFetcher,
    overrides: Partial<Pick<RetryConfig, "maxAttempts" | "waitBetweenMs">> = {},
  ): Promise<RawRow[]> {
    const maxAttempts = overrides.maxAttempts ?? this.config.maxAttempts;
    const waitBetweenMs = overrides.waitBetweenMs ?? this.config.waitBetweenMs;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const rows = await source.fetchCurrentRows(this.config.rowTimeoutMs);

        if (rows.length > 0) {
          return rows;
        }

        this.logger.warn(
          { attempt, maxAttempts },
          `Attempt ${attempt}/${maxAttempts}: 테이블 행이 비어 있음`,
        );
      } catch (error) {
        if (!(error instanceof PageTimeoutError)) {
          throw error;
        }

        this.logger.warn(
          { attempt, maxAttempts, error: error.message },
          `Attempt ${attempt}/${maxAttempts}: 테이블 행을 아직 찾지 못함`,
        );

        if (attempt < maxAttempts) {
          await this.sleep(waitBetweenMs);
        }
      }
    }

    this.logger.warn({ maxAttempts }, "재시도 소진 - 빈 결과 반환");
    return [];
  }
}
