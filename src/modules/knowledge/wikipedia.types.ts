/** Injection token for the raw Wikipedia summary lookup */
export const WIKI_SUMMARY_FETCHER = Symbol('WIKI_SUMMARY_FETCHER');

/** Fields of a Wikipedia REST summary used here */
export interface WikiSummary {
    type: string;
    title: string;
    extract: string;
}

export type WikiSummaryFetcher = (query: string) => Promise<WikiSummary>;
