import { ResultSelectors } from './BrowserDriver';

/**
 * Where a search engine lives and how its result page is laid out.
 * Markup changes on the engine side only ever touch this file.
 */
export interface SearchEngineProfile extends ResultSelectors {
    name: string;
    entryUrl: string;
    /** The primary search box on the entry page. */
    searchBoxSelector: string;
}

export const SEARCH_ENGINE_NAMES = ['duckduckgo', 'bing', 'google'] as const;

export type SearchEngineName = typeof SEARCH_ENGINE_NAMES[number];

export const SEARCH_ENGINE_PROFILES: Record<SearchEngineName, SearchEngineProfile> = {
    duckduckgo: {
        name: 'duckduckgo',
        entryUrl: 'https://duckduckgo.com/',
        searchBoxSelector: 'input[name="q"]',
        containerSelector: '[data-testid="mainline"]',
        itemSelector: 'article[data-testid="result"]',
        titleSelector: 'h2',
        linkSelector: 'a[data-testid="result-title-a"]'
    },
    bing: {
        name: 'bing',
        entryUrl: 'https://www.bing.com/',
        searchBoxSelector: 'textarea[name="q"], input[name="q"]',
        containerSelector: '#b_results',
        itemSelector: 'li.b_algo',
        titleSelector: 'h2',
        linkSelector: 'h2 a'
    },
    google: {
        name: 'google',
        entryUrl: 'https://www.google.com/',
        searchBoxSelector: 'textarea[name="q"], input[name="q"]',
        containerSelector: '#search',
        itemSelector: 'div.g',
        titleSelector: 'h3',
        linkSelector: 'a'
    }
};

export function getSearchEngineProfile(name: SearchEngineName): SearchEngineProfile {
    return SEARCH_ENGINE_PROFILES[name];
}
