/**
 * 지정한 시간(ms)만큼 대기
 */
export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));
