/**
 * RetryPolicy 단위 테스트
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import { RetryPolicy } from "@/utils/RetryPolicy";
import type { RetryConfig } from "@/core/domain/ExtractionConfig";
import type { RawRow } from "@/core/interfaces/IPageSource";
import {
  ConfigError,
  ExtractionError,
  ExtractionErrorType,
  PageTimeoutError,
} from "@/core/interfaces/ExtractionErrorType";
import { createCapturingLogger, silentLogger } from "../helpers/testLogger";

const CONFIG: RetryConfig = {
  maxAttempts: 3,
  waitBetweenMs: 2000,
  rowTimeoutMs: 30000,
};

const ROWS: RawRow[] = [["Acme LLC", "ID1"], ["Beta Inc", "ID2"]];

const timeout = () => new PageTimeoutError("table rows not attached");

describe("RetryPolicy", () => {
  let fetchCurrentRows: jest.Mock<(timeoutMs: number) => Promise<RawRow[]>>;
  let sleep: jest.Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    fetchCurrentRows = jest.fn<(timeoutMs: number) => Promise<RawRow[]>>();
    sleep = jest.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
  });

  it("첫 시도에 행이 있으면 바로 반환", async () => {
    fetchCurrentRows.mockResolvedValue(ROWS);
    const policy = new RetryPolicy(CONFIG, silentLogger, sleep);

    const rows = await policy.fetchRows({ fetchCurrentRows });

    expect(rows).toEqual(ROWS);
    expect(fetchCurrentRows).toHaveBeenCalledTimes(1);
    expect(fetchCurrentRows).toHaveBeenCalledWith(30000);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("타임아웃 2회 후 성공 → 대기 2회", async () => {
    fetchCurrentRows
      .mockRejectedValueOnce(timeout())
      .mockRejectedValueOnce(timeout())
      .mockResolvedValueOnce(ROWS);
    const policy = new RetryPolicy(CONFIG, silentLogger, sleep);

    const rows = await policy.fetchRows({ fetchCurrentRows });

    expect(rows).toEqual(ROWS);
    expect(fetchCurrentRows).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[2000], [2000]]);
  });

  it("모든 시도 타임아웃 → 빈 배열, 마지막 시도 후에는 대기 없음", async () => {
    fetchCurrentRows.mockRejectedValue(timeout());
    const capture = createCapturingLogger();
    const policy = new RetryPolicy(CONFIG, capture.logger, sleep);

    const rows = await policy.fetchRows({ fetchCurrentRows });

    expect(rows).toEqual([]);
    expect(fetchCurrentRows).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(capture.warnings().map((entry) => entry.msg)).toEqual([
      "Attempt 1/3: 테이블 행을 아직 찾지 못함",
      "Attempt 2/3: 테이블 행을 아직 찾지 못함",
      "Attempt 3/3: 테이블 행을 아직 찾지 못함",
      "재시도 소진 - 빈 결과 반환",
    ]);
  });

  it("빈 결과는 대기 없이 재시도", async () => {
    fetchCurrentRows.mockResolvedValueOnce([]).mockResolvedValueOnce(ROWS);
    const policy = new RetryPolicy(CONFIG, silentLogger, sleep);

    const rows = await policy.fetchRows({ fetchCurrentRows });

    expect(rows).toEqual(ROWS);
    expect(fetchCurrentRows).toHaveBeenCalledTimes(2);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("계속 빈 결과 → maxAttempts 회 시도 후 빈 배열", async () => {
    fetchCurrentRows.mockResolvedValue([]);
    const policy = new RetryPolicy(CONFIG, silentLogger, sleep);

    await expect(policy.fetchRows({ fetchCurrentRows })).resolves.toEqual([]);
    expect(fetchCurrentRows).toHaveBeenCalledTimes(3);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("타임아웃이 아닌 에러는 재시도 없이 전파", async () => {
    const failure = new ExtractionError(
      ExtractionErrorType.UNKNOWN,
      "page crashed",
    );
    fetchCurrentRows.mockRejectedValue(failure);
    const policy = new RetryPolicy(CONFIG, silentLogger, sleep);

    await expect(policy.fetchRows({ fetchCurrentRows })).rejects.toBe(failure);
    expect(fetchCurrentRows).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("호출 단위 오버라이드 적용", async () => {
    fetchCurrentRows.mockRejectedValue(timeout());
    const policy = new RetryPolicy(CONFIG, silentLogger, sleep);

    const rows = await policy.fetchRows(
      { fetchCurrentRows },
      { maxAttempts: 2, waitBetweenMs: 50 },
    );

    expect(rows).toEqual([]);
    expect(fetchCurrentRows).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[50]]);
  });

  it("maxAttempts 가 1 미만이면 ConfigError", () => {
    expect(
      () => new RetryPolicy({ ...CONFIG, maxAttempts: 0 }, silentLogger, sleep),
    ).toThrow(ConfigError);
    expect(
      () => new RetryPolicy({ ...CONFIG, maxAttempts: 1.5 }, silentLogger, sleep),
    ).toThrow("retry.maxAttempts must be a positive integer (got 1.5)");
  });
});
