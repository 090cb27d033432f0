/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 콘솔 + 파일 동시 출력
 * - 일일 로그 로테이션 (logs/YYYY-MM-DD/extractor.log)
 * - error 이상은 logs/YYYY-MM-DD/error.log 에도 기록
 * - 구조화된 JSON 로깅
 *
 * 콘솔 출력:
 * - LOG_PRETTY=true: 색상 포맷
 * - 그 외: JSON 포맷
 *
 * 파일 출력:
 * - NODE_ENV=test 또는 LOG_TO_FILE=false 이면 비활성화
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, type RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { LOG_CONFIG } from "@/config/constants";
import {
  getDateStringWithDash,
  getTimestampWithTimezone,
} from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (NODE_ENV === "test"
    ? "silent"
    : NODE_ENV === "production"
      ? "info"
      : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = process.env.LOG_TO_FILE !== "false" && NODE_ENV !== "test";

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      fs.mkdirSync(path.join(LOG_DIR, dateDir), { recursive: true });
      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      immutable: true,
      path: LOG_DIR,
      maxFiles: LOG_CONFIG.MAX_FILES,
      maxSize: LOG_CONFIG.MAX_SIZE,
    },
  );
}

/**
 * chunk 에서 level 라벨 추출 (JSON 파싱 실패 시 undefined)
 */
function readLevel(chunk: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(chunk);
    if (typeof parsed === "object" && parsed !== null && "level" in parsed) {
      return String(parsed.level);
    }
  } catch {
    return undefined;
  }
  return undefined;
}

/**
 * 파일 라우팅 스트림
 * 전체 로그는 extractor.log, error/fatal 은 error.log 에도 기록
 */
class FileRoutingStream implements DestinationStream {
  constructor(
    private readonly main: RotatingFileStream,
    private readonly errors: RotatingFileStream,
  ) {}

  write(chunk: string): boolean {
    const level = readLevel(chunk);
    if (level === "error" || level === "fatal") {
      this.errors.write(chunk);
    }
    return this.main.write(chunk);
  }
}

const fileStreams: RotatingFileStream[] = [];
const streams: pino.StreamEntry[] = [];

if (LOG_TO_FILE) {
  fs.mkdirSync(LOG_DIR, { recursive: true });
  const main = createRotatingStream(LOG_CONFIG.FILE_PREFIX);
  const errors = createRotatingStream("error");
  fileStreams.push(main, errors);
  streams.push({ level: "debug", stream: new FileRoutingStream(main, errors) });
}

/**
 * 기본 로거 설정
 */
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: LOG_CONFIG.SERVICE_NAME,
    env: NODE_ENV,
  },
};

/**
 * Pino 로그 레벨 상수
 */
const LOG_LEVELS = {
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
} as const;

type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

/**
 * 색상 콘솔 포맷터
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const star = logObj.important ? " ⭐" : "";
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const [color, label] =
    level >= LOG_LEVELS.FATAL
      ? ["\x1b[35m", "FATAL"]
      : level >= LOG_LEVELS.ERROR
        ? ["\x1b[31m", "ERROR"]
        : level >= LOG_LEVELS.WARN
          ? ["\x1b[33m", "WARN"]
          : level >= LOG_LEVELS.INFO
            ? ["\x1b[32m", "INFO"]
            : ["\x1b[90m", "DEBUG"];

  console.error(
    `[${time}] ${color}${label}\x1b[0m${star} \x1b[36m${msg}\x1b[0m`,
  );

  const excludedFields = ["msg", "important"];
  for (const [field, value] of Object.entries(logObj)) {
    if (excludedFields.includes(field)) continue;
    const rendered =
      typeof value === "object" && value !== null
        ? JSON.stringify(value, null, 2)
            .split("\n")
            .map((l) => "  " + l)
            .join("\n")
        : String(value);
    console.error(`  ${field}: ${rendered}`);
  }
};

/**
 * JSON 콘솔 포맷터
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.log(
    JSON.stringify({ time: getTimestampWithTimezone(), level, ...logObj }),
  );
};

/**
 * 콘솔 출력 Hook
 * logger.info(obj, msg) / logger.info(msg) 두 형식 모두 처리
 */
function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      const [first, second]: unknown[] = [...inputArgs];
      const logObj: Record<string, unknown> = {};

      if (typeof first === "string") {
        logObj.msg = first;
      } else if (first instanceof Error) {
        logObj.error = first.message;
        if (typeof second === "string") logObj.msg = second;
      } else if (typeof first === "object" && first !== null) {
        Object.assign(logObj, first);
        if (typeof second === "string") logObj.msg = second;
      }

      formatter(logObj, level);
    },
  };
}

const hooks = createConsoleHook(
  LOG_PRETTY ? formatConsolePretty : formatConsoleJson,
);

/**
 * 메인 로거 인스턴스
 */
const logger: pino.Logger = pino(
  { ...baseConfig, hooks },
  pino.multistream(streams),
);

/**
 * 로그 파일 스트림 종료
 * 로테이션 타이머가 프로세스 종료를 막지 않도록 실행 종료 시 호출
 */
async function closeLogFiles(): Promise<void> {
  await Promise.all(
    fileStreams.splice(0).map(
      (stream) =>
        new Promise<void>((resolve) => {
          stream.end(() => resolve());
        }),
    ),
  );
}

export { logger, closeLogFiles };

export type Logger = pino.Logger;
