/**
 * Extraction 설정 로더
 * Singleton Pattern 적용
 *
 * 순서:
 * 1. 수집 대상 프로필 YAML 로드 (src/config/sources/{profile}.yaml)
 * 2. 기본값(EXTRACTION_DEFAULTS) + 환경변수 오버라이드 병합
 * 3. zod 스키마 검증 → ExtractionConfig
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import type { ZodError } from "zod";
import {
  ExtractionConfigSchema,
  SourceProfileSchema,
  type ExtractionConfig,
  type SourceProfile,
} from "@/core/domain/ExtractionConfig";
import { ConfigError } from "@/core/interfaces/ExtractionErrorType";
import { EXTRACTION_DEFAULTS, PATH_CONFIG } from "./constants";

type Env = Record<string, string | undefined>;

export interface ResolveOptions {
  /** 프로필 이름 (미지정 시 SOURCE_PROFILE 환경변수 → 기본값) */
  profile?: string;
  /** 환경변수 (테스트 주입용, 기본: process.env) */
  env?: Env;
}

/**
 * zod 에러 → 한 줄 메시지
 */
function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * 숫자 환경변수 읽기
 * 미설정/빈 문자열이면 기본값, 숫자가 아니면 NaN (스키마 검증에서 거부)
 */
function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  return Number(raw);
}

function readBoolean(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return undefined;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new ConfigError(`${key} must be true or false (got "${env[key]}")`);
}

/**
 * Config Loader Singleton
 */
export class ConfigLoader {
  private static instance: ConfigLoader;
  private profileCache: Map<string, SourceProfile> = new Map();

  constructor(
    private readonly sourcesDir: string = path.join(
      __dirname,
      PATH_CONFIG.SOURCES_DIR,
    ),
  ) {}

  /**
   * Singleton 인스턴스 반환
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * 수집 대상 프로필 로드
   */
  loadSourceProfile(name: string): SourceProfile {
    const cached = this.profileCache.get(name);
    if (cached) {
      return cached;
    }

    const profilePath = path.join(this.sourcesDir, `${name}.yaml`);

    if (!fs.existsSync(profilePath)) {
      throw new ConfigError(`Source profile not found: ${profilePath}`);
    }

    let raw: unknown;
    try {
      raw = yaml.load(fs.readFileSync(profilePath, "utf8"));
    } catch (error) {
      throw new ConfigError(
        `Failed to parse source profile ${profilePath}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    const result = SourceProfileSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(
        `Invalid source profile ${name}: ${formatIssues(result.error)}`,
      );
    }

    this.profileCache.set(name, result.data);
    return result.data;
  }

  /**
   * 최종 설정 생성 (프로필 + 기본값 + 환경변수)
   */
  resolve(options: ResolveOptions = {}): ExtractionConfig {
    const env = options.env ?? process.env;
    const profileName =
      options.profile ??
      (env.SOURCE_PROFILE || EXTRACTION_DEFAULTS.SOURCE_PROFILE);
    const profile = this.loadSourceProfile(profileName);
    const headless = readBoolean(env, "HEADLESS");

    const candidate = {
      outputFile: env.OUTPUT_FILE || EXTRACTION_DEFAULTS.OUTPUT_FILE,
      retry: {
        maxAttempts: readNumber(
          env,
          "MAX_RETRIES",
          EXTRACTION_DEFAULTS.MAX_ATTEMPTS,
        ),
        waitBetweenMs: readNumber(
          env,
          "RETRY_WAIT_MS",
          EXTRACTION_DEFAULTS.RETRY_WAIT_MS,
        ),
        rowTimeoutMs: readNumber(
          env,
          "ROW_TIMEOUT_MS",
          EXTRACTION_DEFAULTS.ROW_TIMEOUT_MS,
        ),
      },
      pacing: {
        minMs: readNumber(env, "PACING_MIN_MS", EXTRACTION_DEFAULTS.PACING_MIN_MS),
        maxMs: readNumber(env, "PACING_MAX_MS", EXTRACTION_DEFAULTS.PACING_MAX_MS),
      },
      maxPages: readNumber(env, "MAX_PAGES", EXTRACTION_DEFAULTS.MAX_PAGES),
      source: {
        ...profile,
        targetUrl: env.TARGET_URL || profile.targetUrl,
        browser: {
          ...profile.browser,
          headless: headless ?? profile.browser.headless,
        },
      },
    };

    const result = ExtractionConfigSchema.safeParse(candidate);
    if (!result.success) {
      throw new ConfigError(
        `Invalid extraction config: ${formatIssues(result.error)}`,
      );
    }

    return result.data;
  }

  /**
   * 사용 가능한 프로필 목록
   */
  getAvailableProfiles(): string[] {
    if (!fs.existsSync(this.sourcesDir)) {
      throw new ConfigError(`Sources directory not found: ${this.sourcesDir}`);
    }

    return fs
      .readdirSync(this.sourcesDir)
      .filter((file) => file.endsWith(".yaml"))
      .map((file) => file.replace(/\.yaml$/, ""))
      .sort();
  }

  /**
   * 캐시 클리어 (테스트용)
   */
  clearCache(): void {
    this.profileCache.clear();
  }
}
