/**
 * Extraction Engine
 *
 * 페이지 단위 추출 루프 (상태 머신)
 *
 * 흐름:
 * 1. 진행 상황 로드 (출력 파일 → 저장된 키)
 * 2. PageSource 세션 생성 (실패 시 FAILED)
 * 3. GATED: 외부 준비 신호 대기
 * 4. FETCHING: 재시도 포함 행 조회, 비어 있으면 DONE
 * 5. EXTRACTING: 행 → 레코드 → 중복 제거 후 저장
 * 6. PAGINATING: 다음 페이지 이동 + 무작위 대기, 버튼 없음/에러 시 DONE
 * 7. 종료 상태와 관계없이 세션 정리
 */

import { logger as defaultLogger, type Logger } from "@/config/logger";
import type {
  ExtractionState,
  ExtractionSummary,
  TerminalState,
  TerminationReason,
} from "@/core/domain/ExtractionState";
import type {
  IPageSource,
  IReadinessGate,
  RawRow,
} from "@/core/interfaces/IPageSource";
import type { IProgressStore } from "@/core/interfaces/IProgressStore";
import {
  ExtractionError,
  ExtractionErrorType,
} from "@/core/interfaces/ExtractionErrorType";
import { RecordCodec } from "@/extractors/RecordCodec";
import { RetryPolicy } from "@/utils/RetryPolicy";
import { PacingDelay } from "@/utils/PacingDelay";
import { logImportant } from "@/utils/LoggerContext";

/**
 * 엔진 의존성
 */
export interface ExtractionEngineDeps {
  source: IPageSource;
  gate: IReadinessGate;
  store: IProgressStore;
  codec: RecordCodec;
  retryPolicy: RetryPolicy;
  pacing: PacingDelay;
  /** 최대 처리 페이지 수 (0 = 제한 없음) */
  maxPages?: number;
  logger?: Logger;
}

type PaginationOutcome =
  | "advanced"
  | Extract<
      TerminationReason,
      "no_next_page" | "advance_rejected" | "pagination_error"
    >;

interface RunOutcome {
  state: TerminalState;
  termination: TerminationReason;
  error?: string;
}

interface RunCounters {
  pagesProcessed: number;
  rowsSeen: number;
  recordsSaved: number;
  duplicatesSkipped: number;
  rowsSkipped: number;
  saveFailures: number;
}

const emptyCounters = (): RunCounters => ({
  pagesProcessed: 0,
  rowsSeen: 0,
  recordsSaved: 0,
  duplicatesSkipped: 0,
  rowsSkipped: 0,
  saveFailures: 0,
});

export class ExtractionEngine {
  private readonly source: IPageSource;
  private readonly gate: IReadinessGate;
  private readonly store: IProgressStore;
  private readonly codec: RecordCodec;
  private readonly retryPolicy: RetryPolicy;
  private readonly pacing: PacingDelay;
  private readonly maxPages: number;
  private readonly logger: Logger;

  private state: ExtractionState = "GATED";
  private counters: RunCounters = emptyCounters();

  constructor(deps: ExtractionEngineDeps) {
    this.source = deps.source;
    this.gate = deps.gate;
    this.store = deps.store;
    this.codec = deps.codec;
    this.retryPolicy = deps.retryPolicy;
    this.pacing = deps.pacing;
    this.maxPages = deps.maxPages ?? 0;
    this.logger = deps.logger ?? defaultLogger;
  }

  getState(): ExtractionState {
    return this.state;
  }

  /**
   * 추출 실행
   * 어떤 경로로 종료되든 PageSource 세션은 정리된다.
   */
  async run(): Promise<ExtractionSummary> {
    const startedAt = Date.now();
    this.counters = emptyCounters();
    this.state = "GATED";

    let outcome: RunOutcome;

    try {
      outcome = await this.execute();
    } catch (error) {
      const wrapped = ExtractionError.wrap(
        error,
        ExtractionErrorType.UNKNOWN,
        "추출 루프 실행 실패",
      );
      this.logger.fatal(wrapped.toLogObject(), "Critical execution failure");
      outcome = {
        state: "FAILED",
        termination: "fatal_error",
        error: wrapped.message,
      };
    } finally {
      await this.releaseSession();
    }

    this.transition(outcome.state);

    const summary: ExtractionSummary = {
      state: outcome.state,
      termination: outcome.termination,
      ...this.counters,
      knownRecords: this.store.size(),
      durationMs: Date.now() - startedAt,
      ...(outcome.error !== undefined ? { error: outcome.error } : {}),
    };

    logImportant(this.logger, "추출 종료", { ...summary });
    return summary;
  }

  private async execute(): Promise<RunOutcome> {
    const known = await this.store.load();
    this.logger.info({ existingRecords: known.size }, "Extraction 초기화");

    try {
      await this.source.open();
    } catch (error) {
      const wrapped = ExtractionError.wrap(
        error,
        ExtractionErrorType.SESSION_INIT,
        "PageSource 세션 생성 실패",
      );
      this.logger.fatal(wrapped.toLogObject(), "세션 초기화 실패 - 실행 중단");
      return {
        state: "FAILED",
        termination: "session_failed",
        error: wrapped.message,
      };
    }

    const ready = await this.gate.waitUntilReady();
    if (!ready) {
      this.logger.warn("준비 신호 없이 종료 - 추출 생략");
      return { state: "DONE", termination: "gate_declined" };
    }
    this.logger.info("결과 화면 확인 - 자동 추출 시작");

    let page = 1;

    for (;;) {
      this.transition("FETCHING");
      this.logger.info({ page }, `Processing page ${page}...`);

      const rows = await this.retryPolicy.fetchRows(this.source);
      if (rows.length === 0) {
        this.logger.info(
          { page },
          "더 이상 데이터 행 없음 - 페이지네이션 종료로 간주",
        );
        return { state: "DONE", termination: "no_rows" };
      }

      this.transition("EXTRACTING");
      const saved = await this.extractRows(rows, page);
      this.counters.pagesProcessed++;

      if (saved === 0) {
        this.logger.warn(
          { page, rows: rows.length },
          `Page ${page} processed but no new unique records found`,
        );
      }

      if (this.maxPages > 0 && page >= this.maxPages) {
        this.logger.info({ page, maxPages: this.maxPages }, "최대 페이지 도달");
        return { state: "DONE", termination: "max_pages" };
      }

      this.transition("PAGINATING");
      const pagination = await this.paginate(page);
      if (pagination !== "advanced") {
        return { state: "DONE", termination: pagination };
      }

      page++;
    }
  }

  /**
   * 행 목록 처리
   * @returns 새로 저장된 레코드 수
   */
  private async extractRows(rows: RawRow[], page: number): Promise<number> {
    let saved = 0;

    for (const [rowIndex, row] of rows.entries()) {
      this.counters.rowsSeen++;

      const record = this.codec.decode(row, { page, rowIndex });
      if (!record) {
        this.counters.rowsSkipped++;
        continue;
      }

      const outcome = await this.store.append(record);
      switch (outcome) {
        case "saved":
          saved++;
          this.counters.recordsSaved++;
          break;
        case "duplicate":
          this.counters.duplicatesSkipped++;
          break;
        case "failed":
          this.counters.saveFailures++;
          break;
      }
    }

    this.logger.debug(
      { page, rows: rows.length, saved },
      "페이지 추출 완료",
    );
    return saved;
  }

  /**
   * 다음 페이지 이동
   * 조회/클릭 중 에러는 페이지네이션 종료로 간주 (FAILED 아님)
   */
  private async paginate(page: number): Promise<PaginationOutcome> {
    try {
      const hasNext = await this.source.hasNextPage();
      if (!hasNext) {
        this.logger.info(
          { page },
          "Next button disabled or not found. Pagination complete.",
        );
        return "no_next_page";
      }

      const advanced = await this.source.advancePage();
      if (!advanced) {
        this.logger.warn({ page }, "다음 페이지 이동 실패 - 종료");
        return "advance_rejected";
      }
    } catch (error) {
      const wrapped = ExtractionError.wrap(
        error,
        ExtractionErrorType.PAGINATION,
        "Pagination error",
        page,
      );
      this.logger.error(wrapped.toLogObject(), "Pagination error - 종료");
      return "pagination_error";
    }

    await this.pacing.wait(`page ${page} → ${page + 1}`);
    return "advanced";
  }

  private async releaseSession(): Promise<void> {
    try {
      this.logger.info("브라우저 세션 종료 중...");
      await this.source.close();
    } catch (error) {
      this.logger.error(
        ExtractionError.wrap(
          error,
          ExtractionErrorType.UNKNOWN,
          "세션 정리 실패",
        ).toLogObject(),
        "세션 정리 실패",
      );
    }
  }

  private transition(next: ExtractionState): void {
    if (this.state === next) return;
    this.logger.debug({ from: this.state, to: next }, "상태 전이");
    this.state = next;
  }
}
