import { z } from 'zod';
import { BrowserSession, SearchResult } from './BrowserSession';
import { CapabilityRegistry } from '../core/CapabilityRegistry';
import { ok } from '../core/errors';

export const BROWSER_CAPABILITY_NAMES = [
    'launch_browser',
    'navigate_to_search_engine',
    'search_for',
    'extract_search_results',
    'fetch_page_content',
    'browser_status'
] as const;

export function formatSearchResults(results: SearchResult[]): string {
    if (results.length === 0) return 'No search results found.';
    return results.map((r, i) => `${i + 1}. ${r.title}\n   ${r.url}`).join('\n');
}

/**
 * Exposes the session's operations to the oracle. Navigation and page
 * fetches launch the browser on demand; search and extraction never do,
 * so their preconditions stay visible to the oracle.
 */
export function registerBrowserCapabilities(registry: CapabilityRegistry, session: BrowserSession): void {
    registry.register({
        name: 'launch_browser',
        description: 'Start the web browser. Must happen before any other browser action; calling it again is harmless.',
        args: {}
    }, async () => {
        const launched = await session.launch();
        return launched.ok ? ok('Browser is running.') : launched;
    });

    registry.register({
        name: 'navigate_to_search_engine',
        description: 'Open the search engine home page. Required before search_for.',
        args: {}
    }, async () => {
        const launched = await session.launch();
        if (!launched.ok) return launched;
        const navigated = await session.navigateToSearchEngine();
        return navigated.ok ? ok('Search engine page loaded.') : navigated;
    });

    registry.register({
        name: 'search_for',
        description: 'Type a query into the search box and submit it. Requires navigate_to_search_engine first.',
        args: {
            query: z.string().describe('The search query')
        }
    }, async ({ query }) => {
        const searched = await session.searchFor(query);
        return searched.ok ? ok(`Search submitted for "${query.trim()}". Results are on the page.`) : searched;
    });

    registry.register({
        name: 'extract_search_results',
        description: 'Read the titles and URLs of the top results on the current search results page.',
        args: {}
    }, async () => {
        const extracted = await session.extractSearchResults();
        return extracted.ok ? ok(formatSearchResults(extracted.value)) : extracted;
    });

    registry.register({
        name: 'fetch_page_content',
        description: 'Open a URL and return the main text of the page, truncated.',
        args: {
            url: z.string().describe('Absolute http(s) URL to open')
        }
    }, async ({ url }) => {
        const launched = await session.launch();
        if (!launched.ok) return launched;
        const fetched = await session.fetchPageContent(url);
        if (!fetched.ok) return fetched;
        return ok(`Content of ${fetched.value.url} (from ${fetched.value.source}):\n${fetched.value.text}`);
    });

    registry.register({
        name: 'browser_status',
        description: 'Report the browser session state and current URL. Has no side effects.',
        args: {}
    }, async () => ok(session.describe()));
}
