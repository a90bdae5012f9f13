import { chromium, Browser, BrowserContext, Page } from 'playwright';
import { BrowserDriver, DriverBrowser, DriverPage, GotoOptions, LaunchOptions, ResultSelectors } from './BrowserDriver';
import { logger } from '../utils/logger';

const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

class PlaywrightPage implements DriverPage {
    constructor(private page: Page) { }

    public async goto(url: string, options: GotoOptions): Promise<void> {
        await this.page.goto(url, { waitUntil: options.waitUntil, timeout: options.timeoutMs });
    }

    public async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
        await this.page.waitForSelector(selector, { state: 'attached', timeout: timeoutMs });
    }

    public async fill(selector: string, text: string, timeoutMs: number): Promise<void> {
        await this.page.fill(selector, text, { timeout: timeoutMs });
    }

    public async press(selector: string, key: string, timeoutMs: number): Promise<void> {
        await this.page.press(selector, key, { timeout: timeoutMs });
    }

    public async extractResults(selectors: ResultSelectors): Promise<unknown> {
        return this.page.evaluate((sel) => {
            const container = document.querySelector(sel.containerSelector);
            if (!container) return null;
            return Array.from(container.querySelectorAll(sel.itemSelector)).map(item => {
                const titleEl = item.querySelector(sel.titleSelector);
                const linkEl = item.querySelector(sel.linkSelector);
                const title = titleEl instanceof HTMLElement ? titleEl.innerText : (titleEl?.textContent ?? '');
                const url = linkEl instanceof HTMLAnchorElement ? linkEl.href : (linkEl?.getAttribute('href') ?? '');
                return { title: title.trim(), url: url.trim() };
            });
        }, selectors);
    }

    public async innerText(selector: string, timeoutMs: number): Promise<string | null> {
        const locator = this.page.locator(selector).first();
        if (await locator.count() === 0) return null;
        return locator.innerText({ timeout: timeoutMs });
    }

    public url(): string {
        return this.page.url();
    }

    public async close(): Promise<void> {
        await this.page.close();
    }
}

class PlaywrightBrowser implements DriverBrowser {
    constructor(private browser: Browser, private context: BrowserContext) { }

    public async newPage(): Promise<DriverPage> {
        return new PlaywrightPage(await this.context.newPage());
    }

    public async close(): Promise<void> {
        await this.context.close();
        await this.browser.close();
    }
}

/**
 * Chromium through Playwright. Browser binaries are expected to be installed
 * already (`npx playwright install chromium`).
 */
export class PlaywrightDriver implements BrowserDriver {
    private browsers: Set<Browser> = new Set();

    public async launch(options: LaunchOptions): Promise<DriverBrowser> {
        // --disable-blink-features=AutomationControlled reduces bot detection on search pages
        const browser = await chromium.launch({
            headless: options.headless,
            timeout: options.timeoutMs,
            args: ['--disable-blink-features=AutomationControlled']
        });
        this.browsers.add(browser);
        browser.on('disconnected', () => this.browsers.delete(browser));

        const context = await browser.newContext({
            userAgent: USER_AGENT,
            viewport: { width: 1280, height: 720 },
            deviceScaleFactor: 1,
        });
        await context.addInitScript(() => {
            Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
        });

        return new PlaywrightBrowser(browser, context);
    }

    public async dispose(): Promise<void> {
        for (const browser of this.browsers) {
            logger.warn('PlaywrightDriver: Closing browser left open at dispose');
            await browser.close();
        }
        this.browsers.clear();
    }
}
