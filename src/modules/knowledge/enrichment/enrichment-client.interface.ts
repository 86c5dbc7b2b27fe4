/** Injection token for the knowledge-mode context source */
export const ENRICHMENT_CLIENT = Symbol('ENRICHMENT_CLIENT');

export type EnrichmentFailureReason = 'empty' | 'ambiguous' | 'not-found' | 'error';

export interface EnrichmentSuccess {
    ok: true;
    /** Display name of the source, e.g. "Wikipedia" */
    source: string;
    title: string;
    summary: string;
}

export interface EnrichmentFailure {
    ok: false;
    reason: EnrichmentFailureReason;
    message: string;
}

export type EnrichmentResult = EnrichmentSuccess | EnrichmentFailure;

/**
 * Looks up a short summary for a query. Implementations resolve every
 * outcome (including lookup failures) as a result instead of rejecting.
 */
export interface EnrichmentClient {
    lookup(query: string, sentences: number): Promise<EnrichmentResult>;
}
