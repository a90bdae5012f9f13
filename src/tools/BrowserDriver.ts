/**
 * Remote-control surface the research session needs from a browser engine.
 * Playwright backs it in production; anything that can launch, navigate,
 * query the DOM, fill a field and press a key can stand in.
 */

export interface LaunchOptions {
    headless: boolean;
    timeoutMs: number;
}

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle';

export interface GotoOptions {
    waitUntil: WaitUntil;
    timeoutMs: number;
}

/** Selectors handed to the in-page result extraction. */
export interface ResultSelectors {
    containerSelector: string;
    itemSelector: string;
    titleSelector: string;
    linkSelector: string;
}

export interface DriverPage {
    goto(url: string, options: GotoOptions): Promise<void>;
    waitForSelector(selector: string, timeoutMs: number): Promise<void>;
    fill(selector: string, text: string, timeoutMs: number): Promise<void>;
    press(selector: string, key: string, timeoutMs: number): Promise<void>;
    /**
     * Runs result extraction inside the page. Resolves to whatever the page
     * produced (`null` when the container is missing); callers validate it.
     */
    extractResults(selectors: ResultSelectors): Promise<unknown>;
    /** Rendered text of the first element matching `selector`, or null when absent. */
    innerText(selector: string, timeoutMs: number): Promise<string | null>;
    url(): string;
    close(): Promise<void>;
}

export interface DriverBrowser {
    newPage(): Promise<DriverPage>;
    close(): Promise<void>;
}

export interface BrowserDriver {
    launch(options: LaunchOptions): Promise<DriverBrowser>;
    /** Releases the automation driver itself; called after the browser is closed. */
    dispose(): Promise<void>;
}
