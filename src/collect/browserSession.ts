/**
 * Browser Session
 *
 * Playwright-backed RenderingSession for a profile timeline. One browser per
 * collection run; `close()` releases it.
 */

import fs from "node:fs";
import { type Browser, type BrowserContext, chromium, type ElementHandle, type Page } from "playwright-core";
import { log } from "../utils/logger.js";
import type { ItemHandle, RenderingSession } from "./types.js";

const browserLog = log.withScope("browser");

export const ITEM_SELECTOR = "article[data-testid='tweet']";
export const PERMALINK_SELECTOR = 'a[role="link"][href*="/status/"]';
export const TIME_SELECTOR = "time";
export const BODY_SELECTOR = '[data-testid="tweetText"]';
export const CONSENT_LABELS = ["Accept", "I agree", "Allow all"] as const;

const LAUNCH_ARGS = ["--disable-blink-features=AutomationControlled"];
const SCROLL_DELTA_Y = 20000;
const CONSENT_CLICK_TIMEOUT_MS = 1500;

export type BrowserSessionOptions = {
  headless: boolean;
  userAgent: string;
  viewport: { width: number; height: number };
  cookiesPath?: string;
  navigationTimeoutMs: number;
};

export type StoredCookie = Parameters<BrowserContext["addCookies"]>[0][number];

const SAME_SITE_VALUES = ["Strict", "Lax", "None"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStoredCookie(raw: unknown): StoredCookie | null {
  if (!isRecord(raw)) return null;
  const { name, value, domain, path, url, expires, httpOnly, secure, sameSite } = raw;
  if (typeof name !== "string" || typeof value !== "string") return null;

  const cookie: StoredCookie = { name, value };
  if (typeof url === "string") cookie.url = url;
  if (typeof domain === "string") cookie.domain = domain;
  if (typeof path === "string") cookie.path = path;
  if (typeof expires === "number") cookie.expires = expires;
  if (typeof httpOnly === "boolean") cookie.httpOnly = httpOnly;
  if (typeof secure === "boolean") cookie.secure = secure;
  const site = SAME_SITE_VALUES.find((candidate) => candidate === sameSite);
  if (site) cookie.sameSite = site;

  // Playwright needs either url or domain+path
  if (!cookie.url && !(cookie.domain && cookie.path)) return null;
  return cookie;
}

/** Parses an exported cookie file. Entries Playwright cannot use are dropped. */
export function parseCookieFile(json: string): StoredCookie[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) {
    throw new Error("cookie file must contain a JSON array");
  }
  return parsed.map(toStoredCookie).filter((cookie): cookie is StoredCookie => cookie !== null);
}

async function loadCookies(context: BrowserContext, cookiesPath: string): Promise<void> {
  if (!fs.existsSync(cookiesPath)) {
    browserLog.warn(`No cookie file at ${cookiesPath}; continuing unauthenticated`);
    return;
  }

  try {
    const cookies = parseCookieFile(fs.readFileSync(cookiesPath, "utf-8"));
    await context.addCookies(cookies);
    browserLog.info(`Loaded ${cookies.length} cookies from ${cookiesPath}`);
  } catch (err) {
    browserLog.warn(`Ignoring unreadable cookie file ${cookiesPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

class ArticleHandle implements ItemHandle {
  constructor(private readonly element: ElementHandle<SVGElement | HTMLElement>) {}

  async permalink(): Promise<string | null> {
    const link = await this.element.$(PERMALINK_SELECTOR);
    return link ? link.getAttribute("href") : null;
  }

  async datetime(): Promise<string | null> {
    const time = await this.element.$(TIME_SELECTOR);
    return time ? time.getAttribute("datetime") : null;
  }

  async bodyTexts(): Promise<string[] | null> {
    const nodes = await this.element.$$(BODY_SELECTOR);
    if (nodes.length === 0) return null;
    const texts: string[] = [];
    for (const node of nodes) {
      texts.push(await node.innerText());
    }
    return texts;
  }
}

export class PlaywrightTimelineSession implements RenderingSession {
  private constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly navigationTimeoutMs: number,
  ) {}

  static async open(options: BrowserSessionOptions): Promise<PlaywrightTimelineSession> {
    const browser = await chromium.launch({ headless: options.headless, args: LAUNCH_ARGS });

    try {
      const context = await browser.newContext({
        userAgent: options.userAgent,
        viewport: options.viewport,
      });
      if (options.cookiesPath) {
        await loadCookies(context, options.cookiesPath);
      }
      const page = await context.newPage();
      return new PlaywrightTimelineSession(browser, page, options.navigationTimeoutMs);
    } catch (err) {
      await browser.close();
      throw err;
    }
  }

  async navigate(url: string): Promise<void> {
    browserLog.debug(`goto ${url}`);
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: this.navigationTimeoutMs });
  }

  async dismissOverlays(): Promise<void> {
    for (const label of CONSENT_LABELS) {
      try {
        await this.page.getByRole("button", { name: label }).click({ timeout: CONSENT_CLICK_TIMEOUT_MS });
        browserLog.debug(`Dismissed overlay via "${label}"`);
      } catch {
        // most pages have no such button
        browserLog.trace(`No "${label}" button`);
      }
    }
  }

  async currentItems(): Promise<ItemHandle[]> {
    const articles = await this.page.$$(ITEM_SELECTOR);
    return articles.map((article) => new ArticleHandle(article));
  }

  async triggerMoreContent(): Promise<void> {
    await this.page.mouse.wheel(0, SCROLL_DELTA_Y);
  }

  async wait(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

export function openTimelineSession(options: BrowserSessionOptions): Promise<RenderingSession> {
  return PlaywrightTimelineSession.open(options);
}
