/**
 * Extraction 설정 스키마
 *
 * ConfigLoader 가 YAML 프로필 + 환경변수를 합쳐 검증한 뒤
 * 각 컴포넌트 생성자에 명시적으로 전달한다.
 */

import { z } from "zod";

/**
 * 수집 대상 프로필 (src/config/sources/*.yaml)
 */
export const SourceProfileSchema = z.object({
  name: z.string().min(1),
  targetUrl: z.string().url(),
  navigationTimeoutMs: z.number().int().positive().default(30000),
  selectors: z.object({
    /** 결과 테이블 행 */
    row: z.string().min(1),
    /** 행 내부 셀 */
    cell: z.string().min(1).default("td"),
    /** 다음 페이지 버튼 후보 */
    nextButton: z.string().min(1).default("button"),
    /** 다음 페이지 버튼 텍스트 (하나라도 포함되면 매칭) */
    nextButtonText: z.array(z.string().min(1)).min(1),
    /** 검색창 (없으면 자동 입력 생략) */
    searchBox: z.string().min(1).optional(),
  }),
  search: z
    .object({
      prefillQuery: z.string().default(""),
    })
    .default({}),
  browser: z
    .object({
      headless: z.boolean().default(false),
      viewport: z
        .object({
          width: z.number().int().positive(),
          height: z.number().int().positive(),
        })
        .default({ width: 1920, height: 1080 }),
    })
    .default({}),
});

export type SourceProfile = z.infer<typeof SourceProfileSchema>;

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1),
  waitBetweenMs: z.number().int().min(0),
  rowTimeoutMs: z.number().int().positive(),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const PacingConfigSchema = z
  .object({
    minMs: z.number().min(0),
    maxMs: z.number().min(0),
  })
  .refine((pacing) => pacing.maxMs > pacing.minMs, {
    message: "pacing.maxMs must be greater than pacing.minMs",
    path: ["maxMs"],
  });

export type PacingConfig = z.infer<typeof PacingConfigSchema>;

export const ExtractionConfigSchema = z.object({
  outputFile: z.string().min(1),
  retry: RetryConfigSchema,
  pacing: PacingConfigSchema,
  maxPages: z.number().int().min(0),
  source: SourceProfileSchema,
});

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
