/**
 * Playwright Page Source
 *
 * 브라우저 기반 IPageSource 구현체
 *
 * 책임:
 * 1. 브라우저/컨텍스트/페이지 생명주기 관리 (stealth 적용)
 * 2. 대상 페이지 이동 + 검색창 자동 입력
 * 3. 결과 테이블 행 텍스트 추출
 * 4. 다음 페이지 버튼 조회/클릭
 */

import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import { errors } from "playwright";
import type { Browser, BrowserContext, Locator, Page } from "playwright";

import { buildBrowserArgs } from "@/config/BrowserArgs";
import { logger as defaultLogger, type Logger } from "@/config/logger";
import type { SourceProfile } from "@/core/domain/ExtractionConfig";
import type { IPageSource, RawRow } from "@/core/interfaces/IPageSource";
import { PageTimeoutError } from "@/core/interfaces/ExtractionErrorType";

// Stealth 플러그인 적용 (모듈 레벨)
chromium.use(StealthPlugin());

/**
 * 정규식 특수문자 이스케이프
 */
const escapeRegExp = (text: string): string =>
  text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export class PlaywrightPageSource implements IPageSource {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;

  constructor(
    private readonly profile: SourceProfile,
    private readonly logger: Logger = defaultLogger,
  ) {}

  async open(): Promise<void> {
    if (this.page) {
      this.logger.debug("PlaywrightPageSource 이미 초기화됨");
      return;
    }

    const { browser: browserOptions, targetUrl } = this.profile;
    this.logger.info(
      { headless: browserOptions.headless, targetUrl },
      "Chrome 브라우저 시작",
    );

    this.browser = await chromium.launch({
      headless: browserOptions.headless,
      args: buildBrowserArgs(browserOptions),
    });

    this.context = await this.browser.newContext({
      viewport: browserOptions.viewport,
    });

    // Anti-detection 설정
    await this.context.addInitScript(() => {
      Object.defineProperty(navigator, "webdriver", {
        get: () => false,
      });
    });

    this.page = await this.context.newPage();

    this.logger.info({ targetUrl }, "수동 조작을 위해 대상 페이지로 이동");
    await this.page.goto(targetUrl, {
      waitUntil: "domcontentloaded",
      timeout: this.profile.navigationTimeoutMs,
    });

    await this.prefillSearch(this.page);
  }

  async fetchCurrentRows(timeoutMs: number): Promise<RawRow[]> {
    const page = this.requirePage();
    const { row, cell } = this.profile.selectors;

    try {
      await page.waitForSelector(row, { state: "attached", timeout: timeoutMs });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new PageTimeoutError(
          `결과 행이 ${timeoutMs}ms 내에 나타나지 않음 (${row})`,
          { cause: error },
        );
      }
      throw error;
    }

    // textContent 사용: CSS 로 숨겨진 셀 텍스트까지 포함
    return page.$$eval(
      row,
      (elements, cellSelector) =>
        elements.map((element) =>
          Array.from(element.querySelectorAll(cellSelector)).map((td) =>
            (td.textContent ?? "").trim(),
          ),
        ),
      cell,
    );
  }

  async hasNextPage(): Promise<boolean> {
    const button = this.nextButton();
    if ((await button.count()) === 0) {
      return false;
    }
    return (await button.isVisible()) && (await button.isEnabled());
  }

  async advancePage(): Promise<boolean> {
    const button = this.nextButton();
    if ((await button.count()) === 0) {
      return false;
    }

    // DOM click: 오버레이에 가려진 버튼도 클릭
    await button.evaluate((element) => {
      element.dispatchEvent(
        new MouseEvent("click", { bubbles: true, cancelable: true }),
      );
    });
    return true;
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.page = null;
    this.context = null;
    this.browser = null;

    if (browser) {
      await browser.close();
      this.logger.info("브라우저 세션 종료 완료");
    }
  }

  /**
   * 검색창 포커스 + 검색어 입력 (편의 기능, 실패해도 계속 진행)
   */
  private async prefillSearch(page: Page): Promise<void> {
    const { searchBox } = this.profile.selectors;
    const { prefillQuery } = this.profile.search;
    if (!searchBox || !prefillQuery) {
      return;
    }

    try {
      const box = page.locator(searchBox).first();
      await box.click({ timeout: this.profile.navigationTimeoutMs });
      await box.fill(prefillQuery);
      this.logger.info({ prefillQuery }, "검색창 자동 입력 완료");
    } catch (error) {
      if (!(error instanceof errors.TimeoutError)) {
        throw error;
      }
      this.logger.warn(
        { searchBox },
        "검색창 자동 포커스 실패 - 수동으로 확인하세요",
      );
    }
  }

  private nextButton(): Locator {
    const { nextButton, nextButtonText } = this.profile.selectors;
    const pattern = new RegExp(nextButtonText.map(escapeRegExp).join("|"));
    return this.requirePage()
      .locator(nextButton)
      .filter({ hasText: pattern })
      .first();
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new Error("PlaywrightPageSource가 초기화되지 않음");
    }
    return this.page;
  }
}
