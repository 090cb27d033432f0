/**
 * Record Codec
 *
 * 결과 테이블 행(셀 텍스트 배열) → BusinessRecord 매핑
 *
 * 컬럼 구조:
 * - 0: 상호명, 1: 등록 번호, 2: 상태, 3: 등록일
 * - 4 이후: 대리인 정보 (" | " 로 결합)
 * - 7컬럼 이상이면 4/5/6 을 agent_name / agent_address / agent_email 로도 기록
 *
 * 파싱 중 발생한 에러는 로그만 남기고 null 반환 (배치 중단 X)
 */

import { logger as defaultLogger, type Logger } from "@/config/logger";
import { RECORD_CONFIG } from "@/config/constants";
import type { BusinessRecord } from "@/core/domain/BusinessRecord";
import type { RawRow } from "@/core/interfaces/IPageSource";
import {
  ExtractionError,
  ExtractionErrorType,
} from "@/core/interfaces/ExtractionErrorType";

/**
 * 로그 컨텍스트 (어느 페이지의 몇 번째 행인지)
 */
export interface RowContext {
  page?: number;
  rowIndex?: number;
}

export class RecordCodec {
  constructor(private readonly logger: Logger = defaultLogger) {}

  decode(cells: RawRow, context: RowContext = {}): BusinessRecord | null {
    try {
      if (cells.length < 1) {
        return null;
      }

      const values = cells.map((cell) => cell.trim());
      const businessName = values[0];

      if (!businessName) {
        this.logger.warn(
          { ...context, cell_count: values.length },
          "상호명이 비어 있는 행 건너뜀",
        );
        return null;
      }

      const at = (index: number): string =>
        index < values.length ? values[index] : RECORD_CONFIG.MISSING_VALUE;

      const record: BusinessRecord = {
        business_name: businessName,
        registration_id: at(1),
        status: at(2),
        filing_date: at(3),
        agent_details:
          values.length > 4
            ? values.slice(4).join(RECORD_CONFIG.AGENT_SEPARATOR)
            : RECORD_CONFIG.MISSING_VALUE,
      };

      if (values.length >= RECORD_CONFIG.REFINED_AGENT_MIN_CELLS) {
        record.agent_name = values[4];
        record.agent_address = values[5];
        record.agent_email = values[6];
      }

      return record;
    } catch (error) {
      const wrapped = ExtractionError.wrap(
        error,
        ExtractionErrorType.MALFORMED_ROW,
        "행 파싱 실패",
        context.page,
      );
      this.logger.error(
        { ...wrapped.toLogObject(), rowIndex: context.rowIndex },
        "행 파싱 중 에러 - 건너뜀",
      );
      return null;
    }
  }
}
