/**
 * Browser Launch Arguments
 *
 * 카테고리별 Chrome 플래그 조합
 */

/**
 * Browser Arguments Categories
 */
export const BROWSER_ARGS = {
  /**
   * Stealth 플래그 (봇 탐지 우회)
   */
  STEALTH: ["--disable-blink-features=AutomationControlled"],

  /**
   * 수동 조작 편의 (reCAPTCHA 팝업 허용)
   */
  INTERACTIVE: ["--disable-popup-blocking"],

  /**
   * Sandbox 플래그 (Docker / headless 환경)
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox", "--disable-dev-shm-usage"],
} as const;

/**
 * 실행 인자 생성
 * - 창 크기는 viewport 와 동일하게 맞춤
 * - headless 면 sandbox 플래그 추가
 */
export function buildBrowserArgs(options: {
  viewport: { width: number; height: number };
  headless: boolean;
}): string[] {
  const { viewport, headless } = options;
  return [
    `--window-size=${viewport.width},${viewport.height}`,
    ...BROWSER_ARGS.INTERACTIVE,
    ...BROWSER_ARGS.STEALTH,
    ...(headless ? BROWSER_ARGS.SANDBOX : []),
  ];
}
