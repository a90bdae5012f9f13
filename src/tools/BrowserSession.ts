import { z } from 'zod';
import { BrowserDriver, DriverBrowser, DriverPage } from './BrowserDriver';
import { SearchEngineProfile, getSearchEngineProfile } from './SearchEngineProfile';
import { ErrorClassifier, ErrorType } from '../core/ErrorClassifier';
import {
    ExtractionFailure,
    InteractionFailure,
    LaunchFailure,
    NavigationFailure,
    PreconditionFailure,
    Result,
    err,
    ok
} from '../core/errors';
import { logger } from '../utils/logger';

export type SessionState = 'uninitialized' | 'launched' | 'page_active' | 'closed';

export interface SearchResult {
    title: string;
    url: string;
}

export interface PageContent {
    url: string;
    /** Selector the text came from, or `page` for the whole-document fallback. */
    source: string;
    text: string;
}

export interface BrowserSessionOptions {
    headless: boolean;
    navigationTimeoutMs: number;
    selectorTimeoutMs: number;
    contentCharBudget: number;
    minContentLength: number;
    maxSearchResults: number;
    profile: SearchEngineProfile;
}

export const DEFAULT_SESSION_OPTIONS: BrowserSessionOptions = {
    headless: true,
    navigationTimeoutMs: 30000,
    selectorTimeoutMs: 10000,
    contentCharBudget: 2000,
    minContentLength: 200,
    maxSearchResults: 5,
    profile: getSearchEngineProfile('duckduckgo')
};

/** Tried in order; the first one holding enough text wins. */
export const CONTENT_SELECTORS: readonly string[] = [
    'article',
    'main',
    '[role="main"]',
    '#content',
    '.content',
    'body'
];

const WHOLE_PAGE_SELECTOR = 'html';

const RawResultsSchema = z.array(z.object({
    title: z.string(),
    url: z.string()
}));

/**
 * One browser process and one page, driven through a small set of
 * state-checked operations. Nothing here throws: every failure comes back
 * as an `Err` so the capability layer can hand it to the oracle.
 */
export class BrowserSession {
    private browser: DriverBrowser | null = null;
    private page: DriverPage | null = null;
    private sessionState: SessionState = 'uninitialized';
    private currentlyOnSearchEngine = false;
    private resultsPresent = false;
    private readonly options: BrowserSessionOptions;

    constructor(private driver: BrowserDriver, options: Partial<BrowserSessionOptions> = {}) {
        this.options = { ...DEFAULT_SESSION_OPTIONS, ...options };
    }

    public get state(): SessionState {
        return this.sessionState;
    }

    public get onSearchEngine(): boolean {
        return this.currentlyOnSearchEngine;
    }

    public describe(): string {
        const where = this.page ? this.page.url() : 'no page';
        return `state=${this.sessionState} engine=${this.options.profile.name} onSearchEngine=${this.currentlyOnSearchEngine} resultsPresent=${this.resultsPresent} url=${where}`;
    }

    public async launch(): Promise<Result<void>> {
        if (this.sessionState === 'closed') {
            return err(new PreconditionFailure('browser session is closed'));
        }
        if (this.sessionState !== 'uninitialized') {
            logger.debug('BrowserSession: launch requested while already running; nothing to do');
            return ok(undefined);
        }

        let browser: DriverBrowser | null = null;
        try {
            browser = await this.driver.launch({
                headless: this.options.headless,
                timeoutMs: this.options.navigationTimeoutMs
            });
            this.page = await browser.newPage();
            this.browser = browser;
            this.sessionState = 'launched';
            logger.info(`BrowserSession: Browser launched (headless=${this.options.headless})`);
            return ok(undefined);
        } catch (e) {
            logger.error(`BrowserSession: Launch failed: ${ErrorClassifier.messageOf(e)}`);
            const opened = browser;
            if (opened) await this.releaseQuietly('browser', () => opened.close());
            return err(new LaunchFailure(`could not start the browser (${this.reason(e)})`, e));
        }
    }

    public async navigateToSearchEngine(): Promise<Result<void>> {
        const page = this.requirePage('navigate to the search engine', ['launched', 'page_active']);
        if (!page.ok) return page;

        const { entryUrl, name } = this.options.profile;
        const loaded = await this.gotoQuiescent(page.value, entryUrl);
        if (!loaded.ok) {
            this.currentlyOnSearchEngine = false;
            return loaded;
        }

        this.sessionState = 'page_active';
        this.currentlyOnSearchEngine = true;
        this.resultsPresent = false;
        logger.info(`BrowserSession: On ${name} search page`);
        return ok(undefined);
    }

    public async searchFor(query: string): Promise<Result<void>> {
        const page = this.requirePage('search', ['page_active']);
        if (!page.ok) return page;
        if (!this.currentlyOnSearchEngine) {
            return err(new PreconditionFailure('not on the search engine page; navigate to the search engine first'));
        }

        const trimmed = query.trim();
        if (!trimmed) {
            return err(new InteractionFailure('search query is empty'));
        }

        const { searchBoxSelector, containerSelector } = this.options.profile;
        const timeout = this.options.selectorTimeoutMs;
        try {
            await page.value.fill(searchBoxSelector, trimmed, timeout);
            await page.value.press(searchBoxSelector, 'Enter', timeout);
        } catch (e) {
            logger.warn(`BrowserSession: Search box interaction failed: ${ErrorClassifier.messageOf(e)}`);
            return err(new InteractionFailure(`search box not usable (${this.reason(e)})`, e));
        }

        try {
            await page.value.waitForSelector(containerSelector, timeout);
        } catch (e) {
            logger.warn(`BrowserSession: Results never appeared for "${trimmed}": ${ErrorClassifier.messageOf(e)}`);
            this.resultsPresent = false;
            return err(new InteractionFailure(`search results did not appear within ${timeout}ms`, e));
        }

        this.resultsPresent = true;
        logger.info(`BrowserSession: Results loaded for "${trimmed}"`);
        return ok(undefined);
    }

    public async extractSearchResults(): Promise<Result<SearchResult[]>> {
        const page = this.requirePage('extract search results', ['page_active']);
        if (!page.ok) return page;
        if (!this.resultsPresent) {
            return err(new PreconditionFailure('no search results on the page; run a search first'));
        }

        let raw: unknown;
        try {
            raw = await page.value.extractResults(this.options.profile);
        } catch (e) {
            logger.warn(`BrowserSession: Result extraction threw: ${ErrorClassifier.messageOf(e)}`);
            return err(new ExtractionFailure(`could not read the results page (${this.reason(e)})`, e));
        }

        if (raw === null) {
            return err(new ExtractionFailure('results container is missing from the page'));
        }
        const parsed = RawResultsSchema.safeParse(raw);
        if (!parsed.success) {
            return err(new ExtractionFailure('results page has an unexpected structure'));
        }

        const results = parsed.data
            .map(r => ({ title: r.title.trim(), url: r.url.trim() }))
            .filter(r => r.title.length > 0 && r.url.length > 0)
            .slice(0, this.options.maxSearchResults);

        logger.info(`BrowserSession: Extracted ${results.length} result(s)`);
        return ok(results);
    }

    public async fetchPageContent(url: string): Promise<Result<PageContent>> {
        const page = this.requirePage('fetch a page', ['launched', 'page_active']);
        if (!page.ok) return page;

        const target = this.parseHttpUrl(url);
        if (!target) {
            return err(new NavigationFailure(`not an http(s) URL: ${url}`));
        }

        const loaded = await this.gotoQuiescent(page.value, target);
        // Whatever happened, the search page is no longer what the tab shows
        this.currentlyOnSearchEngine = false;
        this.resultsPresent = false;
        if (!loaded.ok) return loaded;
        this.sessionState = 'page_active';

        const { contentCharBudget, minContentLength, selectorTimeoutMs } = this.options;
        try {
            for (const selector of CONTENT_SELECTORS) {
                const raw = await page.value.innerText(selector, selectorTimeoutMs);
                if (raw !== null && raw.length > minContentLength) {
                    return ok({ url: target, source: selector, text: this.clip(raw, contentCharBudget) });
                }
            }
            const whole = await page.value.innerText(WHOLE_PAGE_SELECTOR, selectorTimeoutMs);
            return ok({ url: target, source: 'page', text: this.clip(whole ?? '', contentCharBudget) });
        } catch (e) {
            logger.warn(`BrowserSession: Content extraction failed at ${target}: ${ErrorClassifier.messageOf(e)}`);
            return err(new ExtractionFailure(`could not read page content (${this.reason(e)})`, e));
        }
    }

    /**
     * Releases page, browser and driver in that order. Safe to call any
     * number of times; later calls are no-ops.
     */
    public async close(): Promise<Result<void>> {
        if (this.sessionState === 'closed') return ok(undefined);
        this.sessionState = 'closed';
        this.currentlyOnSearchEngine = false;
        this.resultsPresent = false;

        const page = this.page;
        const browser = this.browser;
        this.page = null;
        this.browser = null;

        if (page) await this.releaseQuietly('page', () => page.close());
        if (browser) await this.releaseQuietly('browser', () => browser.close());
        await this.releaseQuietly('driver', () => this.driver.dispose());

        logger.info('BrowserSession: Closed');
        return ok(undefined);
    }

    private requirePage(action: string, allowed: SessionState[]): Result<DriverPage> {
        if (!allowed.includes(this.sessionState) || !this.page) {
            const hint = this.sessionState === 'uninitialized'
                ? 'launch the browser first'
                : this.sessionState === 'closed'
                    ? 'the session is closed'
                    : 'navigate to the search engine first';
            return err(new PreconditionFailure(`cannot ${action} while session is ${this.sessionState}; ${hint}`));
        }
        return ok(this.page);
    }

    private async gotoQuiescent(page: DriverPage, url: string): Promise<Result<void>> {
        const timeout = this.options.navigationTimeoutMs;
        try {
            await page.goto(url, { waitUntil: 'networkidle', timeoutMs: timeout });
            return ok(undefined);
        } catch (e) {
            logger.warn(`BrowserSession: Navigation to ${url} failed: ${ErrorClassifier.messageOf(e)}`);
            const classified = ErrorClassifier.classify(e);
            const why = classified.type === ErrorType.TIMEOUT
                ? `page did not settle within ${timeout}ms`
                : this.reason(e);
            return err(new NavigationFailure(`could not load ${url} (${why})`, e));
        }
    }

    private parseHttpUrl(url: string): string | null {
        try {
            const parsed = new URL(url.trim());
            return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? parsed.toString() : null;
        } catch {
            return null;
        }
    }

    private clip(raw: string, budget: number): string {
        return raw.replace(/\s+/g, ' ').trim().slice(0, budget);
    }

    /** Category of a driver error, fit to show the oracle. */
    private reason(e: unknown): string {
        const classified = ErrorClassifier.classify(e);
        return classified.type === ErrorType.UNKNOWN ? 'browser engine error' : classified.message.toLowerCase();
    }

    private async releaseQuietly(what: string, release: () => Promise<void>): Promise<void> {
        try {
            await release();
        } catch (e) {
            logger.warn(`BrowserSession: Failed to release ${what}: ${ErrorClassifier.messageOf(e)}`);
        }
    }
}
