/**
 * Pacing Delay
 *
 * 페이지 이동 사이 무작위 대기 (요청 속도 제한)
 * 대기 시간은 [minMs, maxMs) 균등 분포, 고정값 불가
 */

import { logger as defaultLogger, type Logger } from "@/config/logger";
import type { PacingConfig } from "@/core/domain/ExtractionConfig";
import { ConfigError } from "@/core/interfaces/ExtractionErrorType";
import { sleep as defaultSleep, type SleepFn } from "@/utils/sleep";

export class PacingDelay {
  private readonly minMs: number;
  private readonly maxMs: number;

  constructor(
    bounds: PacingConfig,
    private readonly logger: Logger = defaultLogger,
    private readonly random: () => number = Math.random,
    private readonly sleep: SleepFn = defaultSleep,
  ) {
    if (!(bounds.minMs >= 0 && bounds.maxMs > bounds.minMs)) {
      throw new ConfigError(
        `pacing bounds must satisfy 0 <= minMs < maxMs (got ${bounds.minMs}, ${bounds.maxMs})`,
      );
    }
    this.minMs = bounds.minMs;
    this.maxMs = bounds.maxMs;
  }

  /**
   * 다음 대기 시간 (ms)
   */
  nextDelayMs(): number {
    return this.minMs + this.random() * (this.maxMs - this.minMs);
  }

  /**
   * 무작위 대기 후 실제 대기 시간 반환
   */
  async wait(context?: string): Promise<number> {
    const delayMs = this.nextDelayMs();
    this.logger.debug(
      { delayMs: Math.round(delayMs), context },
      "페이지 간 대기",
    );
    await this.sleep(delayMs);
    return delayMs;
  }

  getBounds(): PacingConfig {
    return { minMs: this.minMs, maxMs: this.maxMs };
  }
}
