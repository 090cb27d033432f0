#!/usr/bin/env node
/**
 * Registry Extractor CLI
 *
 * 사용법:
 *   npm run extract
 *   npm run extract -- --profile registry
 *
 * - 출력 파일(OUTPUT_FILE)에 이미 있는 레코드는 자동으로 건너뜀 (재개)
 * - 브라우저가 열리면 reCAPTCHA 해결 + 검색 실행 후 터미널에서 ENTER
 * - 종료 코드: 0 (완료), 1 (중단), 130/143 (시그널)
 */

import "dotenv/config";
import { v7 as uuidv7 } from "uuid";
import { ConfigLoader } from "@/config/ConfigLoader";
import { EXIT_CODES } from "@/config/constants";
import { closeLogFiles, logger } from "@/config/logger";
import { describeError } from "@/core/interfaces/ExtractionErrorType";
import { RecordCodec } from "@/extractors/RecordCodec";
import { JsonlProgressStore } from "@/repositories/JsonlProgressStore";
import { ConsoleReadinessGate } from "@/scrapers/ConsoleReadinessGate";
import { PlaywrightPageSource } from "@/scrapers/PlaywrightPageSource";
import { ExtractionEngine } from "@/services/ExtractionEngine";
import { createRunLogger, logImportant } from "@/utils/LoggerContext";
import { PacingDelay } from "@/utils/PacingDelay";
import { RetryPolicy } from "@/utils/RetryPolicy";

/**
 * --profile <name> 파싱
 */
function parseProfileArg(argv: string[]): string | undefined {
  const index = argv.indexOf("--profile");
  if (index === -1) return undefined;

  const value = argv[index + 1];
  if (!value || value.startsWith("--")) {
    throw new Error("--profile 옵션에 프로필 이름이 필요합니다");
  }
  return value;
}

async function main(): Promise<number> {
  const config = ConfigLoader.getInstance().resolve({
    profile: parseProfileArg(process.argv.slice(2)),
  });
  const runLogger = createRunLogger(uuidv7(), config.source.name);

  logImportant(runLogger, "Registry Extractor 시작", {
    outputFile: config.outputFile,
    targetUrl: config.source.targetUrl,
    maxAttempts: config.retry.maxAttempts,
    pacing: config.pacing,
    maxPages: config.maxPages,
  });

  const source = new PlaywrightPageSource(config.source, runLogger);

  // 시그널 수신 시에도 브라우저 세션 정리
  const shutdown = (signal: NodeJS.Signals, code: number) => {
    runLogger.warn({ signal }, `${signal} 수신, 브라우저 세션 정리 후 종료`);
    source
      .close()
      .catch((error: unknown) =>
        runLogger.error({ error: describeError(error) }, "세션 정리 실패"),
      )
      .finally(() => process.exit(code));
  };
  process.once("SIGINT", () => shutdown("SIGINT", EXIT_CODES.SIGINT));
  process.once("SIGTERM", () => shutdown("SIGTERM", EXIT_CODES.SIGTERM));

  const engine = new ExtractionEngine({
    source,
    gate: new ConsoleReadinessGate({ logger: runLogger }),
    store: new JsonlProgressStore(config.outputFile, runLogger),
    codec: new RecordCodec(runLogger),
    retryPolicy: new RetryPolicy(config.retry, runLogger),
    pacing: new PacingDelay(config.pacing, runLogger),
    maxPages: config.maxPages,
    logger: runLogger,
  });

  const summary = await engine.run();
  return summary.state === "DONE" ? EXIT_CODES.DONE : EXIT_CODES.FAILED;
}

main()
  .catch((error: unknown) => {
    logger.fatal({ error: describeError(error) }, "Extractor 비정상 종료");
    return EXIT_CODES.FAILED;
  })
  .then(async (code) => {
    process.exitCode = code;
    await closeLogFiles();
  })
  .catch((error: unknown) => {
    console.error("로그 파일 종료 실패", error);
    process.exitCode = EXIT_CODES.FAILED;
  });
