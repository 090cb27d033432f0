/**
 * Console Readiness Gate
 *
 * 운영자가 브라우저에서 reCAPTCHA 를 풀고 검색을 실행한 뒤
 * 터미널에서 ENTER 를 누를 때까지 대기
 */

import * as readline from "readline";
import { logger as defaultLogger, type Logger } from "@/config/logger";
import type { IReadinessGate } from "@/core/interfaces/IPageSource";

export interface ConsoleReadinessGateOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  logger?: Logger;
}

const BANNER = [
  "",
  "=".repeat(60),
  "ACTION REQUIRED: MANUAL BYPASS",
  "1. Solve the reCAPTCHA in the browser.",
  "2. Click the 'Search' button.",
  "3. Ensure the RESULTS TABLE is visible.",
  "=".repeat(60),
  "",
].join("\n");

export const READY_PROMPT =
  "Press ENTER in this terminal once the data table is visible...";

export class ConsoleReadinessGate implements IReadinessGate {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly logger: Logger;

  constructor(options: ConsoleReadinessGateOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * ENTER 입력 시 true, 입력 스트림이 닫히면 false
   */
  async waitUntilReady(): Promise<boolean> {
    this.output.write(BANNER + "\n");

    const rl = readline.createInterface({
      input: this.input,
      output: this.output,
    });

    try {
      const ready = await new Promise<boolean>((resolve) => {
        rl.once("close", () => resolve(false));
        rl.question(READY_PROMPT, () => resolve(true));
      });

      if (ready) {
        this.logger.info("운영자가 결과 테이블 표시를 확인함");
      }
      return ready;
    } finally {
      rl.close();
    }
  }
}
