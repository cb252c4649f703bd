import fs from "node:fs";
import path from "node:path";
import readline from "node:readline/promises";
import { chromium } from "playwright-core";
import { log } from "../utils/logger.js";

const browserLog = log.withScope("browser");

export type LoginOptions = {
  loginUrl: string;
  cookiesPath: string;
  userAgent: string;
  navigationTimeoutMs: number;
};

/**
 * Opens a visible browser on the login page, waits for the operator to sign
 * in, then writes the context cookies for later headless runs.
 */
export async function loginAndSaveCookies(options: LoginOptions): Promise<number> {
  const browser = await chromium.launch({
    headless: false,
    args: ["--disable-blink-features=AutomationControlled"],
  });

  try {
    const context = await browser.newContext({
      userAgent: options.userAgent,
      viewport: { width: 1200, height: 900 },
    });
    const page = await context.newPage();
    await page.goto(options.loginUrl, { waitUntil: "domcontentloaded", timeout: options.navigationTimeoutMs });

    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
      await rl.question("A browser window opened. Log in, and once your timeline is visible press Enter here...");
    } finally {
      rl.close();
    }

    const cookies = await context.cookies();
    const target = path.resolve(options.cookiesPath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, JSON.stringify(cookies, null, 2), "utf-8");
    browserLog.info(`Cookies saved to ${target}`, { count: cookies.length });
    return cookies.length;
  } finally {
    await browser.close();
  }
}
