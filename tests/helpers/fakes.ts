/**
 * 테스트용 IPageSource / IReadinessGate / IProgressStore 구현
 */

import type { BusinessRecord } from "@/core/domain/BusinessRecord";
import type {
  IPageSource,
  IReadinessGate,
  RawRow,
} from "@/core/interfaces/IPageSource";
import type {
  AppendOutcome,
  IProgressStore,
} from "@/core/interfaces/IProgressStore";

export interface FakePageSourceOptions {
  /** open() 에서 throw 할 에러 */
  openError?: Error;
  /** hasNextPage() 에서 throw 할 에러 */
  hasNextError?: Error;
  /** fetchCurrentRows() 에서 throw 할 에러 (모든 호출) */
  fetchError?: Error;
  /** advancePage() 반환값 */
  advanceResult?: boolean;
  /** 마지막 페이지에서도 다음 버튼을 활성으로 보고 */
  alwaysHasNext?: boolean;
  /** close() 에서 throw 할 에러 */
  closeError?: Error;
}

/**
 * 페이지별 행 목록을 순서대로 돌려주는 PageSource
 */
export class FakePageSource implements IPageSource {
  readonly calls: string[] = [];
  fetchTimeouts: number[] = [];
  closeCount = 0;
  private index = 0;

  constructor(
    private readonly pages: RawRow[][],
    private readonly options: FakePageSourceOptions = {},
  ) {}

  get currentPage(): number {
    return this.index + 1;
  }

  async open(): Promise<void> {
    this.calls.push("open");
    if (this.options.openError) throw this.options.openError;
  }

  async fetchCurrentRows(timeoutMs: number): Promise<RawRow[]> {
    this.calls.push(`fetch:${this.currentPage}`);
    this.fetchTimeouts.push(timeoutMs);
    if (this.options.fetchError) throw this.options.fetchError;
    return [...(this.pages[this.index] ?? [])];
  }

  async hasNextPage(): Promise<boolean> {
    this.calls.push("hasNext");
    if (this.options.hasNextError) throw this.options.hasNextError;
    return this.options.alwaysHasNext === true
      ? true
      : this.index < this.pages.length - 1;
  }

  async advancePage(): Promise<boolean> {
    this.calls.push("advance");
    const result = this.options.advanceResult ?? true;
    if (result) this.index++;
    return result;
  }

  async close(): Promise<void> {
    this.calls.push("close");
    this.closeCount++;
    if (this.options.closeError) throw this.options.closeError;
  }
}

export class FakeReadinessGate implements IReadinessGate {
  calls = 0;

  constructor(private readonly ready: boolean = true) {}

  async waitUntilReady(): Promise<boolean> {
    this.calls++;
    return this.ready;
  }
}

/**
 * 메모리 기반 IProgressStore
 */
export class MemoryProgressStore implements IProgressStore {
  readonly saved: BusinessRecord[] = [];
  private readonly keys: Set<string>;

  constructor(
    existing: string[] = [],
    private readonly failingKeys: Set<string> = new Set(),
  ) {
    this.keys = new Set(existing);
  }

  async load(): Promise<Set<string>> {
    return new Set(this.keys);
  }

  contains(key: string): boolean {
    return this.keys.has(key);
  }

  async append(record: BusinessRecord): Promise<AppendOutcome> {
    if (this.keys.has(record.business_name)) return "duplicate";
    if (this.failingKeys.has(record.business_name)) return "failed";
    this.keys.add(record.business_name);
    this.saved.push(record);
    return "saved";
  }

  size(): number {
    return this.keys.size;
  }
}
