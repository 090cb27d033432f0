/**
 * JSONL Progress Store
 *
 * 출력 파일(JSONL)을 재개 체크포인트로 사용하는 IProgressStore 구현체
 *
 * 동작:
 * - load(): 파일을 한 줄씩 읽어 business_name 집합 복원
 * - append(): 미저장 키만 한 줄 append 후 메모리 집합에 등록
 * - 쓰기 실패 시 키를 등록하지 않음 → 같은 실행 또는 다음 실행에서 재시도
 * - 중단된 쓰기로 마지막 줄에 개행이 없으면 다음 append 앞에 개행을 붙임
 *
 * append 는 Mutex 로 한 번에 하나씩 처리
 */

import * as fs from "fs";
import * as fsp from "fs/promises";
import * as path from "path";
import * as readline from "readline";
import { Mutex } from "async-mutex";
import { logger as defaultLogger, type Logger } from "@/config/logger";
import {
  PersistedRecordSchema,
  serializeRecord,
  type BusinessRecord,
} from "@/core/domain/BusinessRecord";
import type {
  AppendOutcome,
  IProgressStore,
} from "@/core/interfaces/IProgressStore";
import {
  ExtractionError,
  ExtractionErrorType,
  describeError,
} from "@/core/interfaces/ExtractionErrorType";

export class JsonlProgressStore implements IProgressStore {
  private readonly keys = new Set<string>();
  private readonly mutex = new Mutex();
  /** 파일 끝이 개행으로 끝나지 않음 (이전 실행의 중단된 쓰기) */
  private unterminatedTail = false;

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = defaultLogger,
  ) {}

  /**
   * 저장된 키 복원
   * - 파일 없음: 빈 집합
   * - 손상된 라인: 경고 후 건너뜀
   * - 읽기 실패: 에러 로그, 그때까지 복원한 키 유지
   */
  async load(): Promise<Set<string>> {
    await fsp.mkdir(path.dirname(path.resolve(this.filePath)), {
      recursive: true,
    });

    if (!fs.existsSync(this.filePath)) {
      this.logger.info(
        { filePath: this.filePath },
        "기존 출력 파일 없음 - 새로 시작",
      );
      return new Set(this.keys);
    }

    let lineNumber = 0;
    let malformed = 0;

    try {
      const lines = readline.createInterface({
        input: fs.createReadStream(this.filePath, { encoding: "utf-8" }),
        crlfDelay: Infinity,
      });

      for await (const line of lines) {
        lineNumber++;
        if (!line.trim()) continue;

        const key = this.parseKey(line);
        if (key === null) {
          malformed++;
          this.logger.warn(
            { filePath: this.filePath, lineNumber },
            "출력 파일의 손상된 라인 건너뜀",
          );
          continue;
        }

        this.keys.add(key);
      }

      this.unterminatedTail = !(await this.endsWithNewline());
      if (this.unterminatedTail) {
        this.logger.warn(
          { filePath: this.filePath, lineNumber },
          "출력 파일 마지막 줄에 개행 없음 - 다음 저장 시 줄 분리",
        );
      }
    } catch (error) {
      this.logger.error(
        { filePath: this.filePath, lineNumber, error: describeError(error) },
        "진행 상황 로드 실패",
      );
    }

    this.logger.info(
      { filePath: this.filePath, records: this.keys.size, malformed },
      "기존 진행 상황 로드 완료",
    );

    return new Set(this.keys);
  }

  contains(key: string): boolean {
    return this.keys.has(key);
  }

  size(): number {
    return this.keys.size;
  }

  async append(record: BusinessRecord): Promise<AppendOutcome> {
    const release = await this.mutex.acquire();

    try {
      if (this.keys.has(record.business_name)) {
        return "duplicate";
      }

      const prefix = this.unterminatedTail ? "\n" : "";

      try {
        await fsp.appendFile(
          this.filePath,
          prefix + serializeRecord(record) + "\n",
          "utf-8",
        );
      } catch (error) {
        const wrapped = ExtractionError.wrap(
          error,
          ExtractionErrorType.OUTPUT_IO,
          "출력 파일 쓰기 실패",
        );
        this.logger.error(
          {
            ...wrapped.toLogObject(),
            filePath: this.filePath,
            business_name: record.business_name,
          },
          "레코드 저장 중 파일 I/O 오류",
        );
        return "failed";
      }

      this.unterminatedTail = false;
      this.keys.add(record.business_name);
      this.logger.info(
        { business_name: record.business_name },
        "레코드 저장 완료",
      );
      return "saved";
    } finally {
      release();
    }
  }

  /**
   * 빈 파일이거나 마지막 바이트가 개행이면 true
   */
  private async endsWithNewline(): Promise<boolean> {
    const handle = await fsp.open(this.filePath, "r");
    try {
      const { size } = await handle.stat();
      if (size === 0) return true;

      const last = Buffer.alloc(1);
      await handle.read(last, 0, 1, size - 1);
      return last[0] === 0x0a;
    } finally {
      await handle.close();
    }
  }

  /**
   * JSON 파싱 + 스키마 검증 후 키 반환 (실패 시 null)
   */
  private parseKey(line: string): string | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      return null;
    }

    const result = PersistedRecordSchema.safeParse(parsed);
    return result.success ? result.data.business_name : null;
  }
}
