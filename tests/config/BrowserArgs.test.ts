import { describe, it, expect } from "@jest/globals";
import { buildBrowserArgs } from "@/config/BrowserArgs";

describe("buildBrowserArgs", () => {
  it("headed 실행은 sandbox 플래그 없음", () => {
    expect(
      buildBrowserArgs({ viewport: { width: 1280, height: 720 }, headless: false }),
    ).toEqual([
      "--window-size=1280,720",
      "--disable-popup-blocking",
      "--disable-blink-features=AutomationControlled",
    ]);
  });

  it("headless 실행은 sandbox 플래그 추가", () => {
    const args = buildBrowserArgs({
      viewport: { width: 1920, height: 1080 },
      headless: true,
    });

    expect(args.slice(-3)).toEqual([
      "--no-sandbox",
      "--disable-setuid-sandbox",
      "--disable-dev-shm-usage",
    ]);
    expect(args[0]).toBe("--window-size=1920,1080");
  });
});
