import { Inject, Injectable, Logger } from '@nestjs/common';
import type { EnrichmentClient, EnrichmentResult } from './enrichment/enrichment-client.interface';
import { firstSentences } from './utils/sentence.util';
import { WIKI_SUMMARY_FETCHER, type WikiSummaryFetcher } from './wikipedia.types';

const SOURCE_NAME = 'Wikipedia';

/**
 * `wiki.summary` rethrows every failure as a `summaryError` whose message is
 * the stringified cause, so a missing page reads "pageError: ...".
 */
function isMissingPage(error: unknown): boolean {
    if (!(error instanceof Error)) {
        return false;
    }
    return error.name === 'pageError'
        || (error.name === 'summaryError' && error.message.startsWith('pageError'));
}

/**
 * Wikipedia Service
 *
 * Fetches a short page summary for knowledge-mode turns.
 * Ambiguous terms, missing pages and transport failures all come back
 * as `{ ok: false }` results with an explanatory message.
 */
@Injectable()
export class WikipediaService implements EnrichmentClient {
    private readonly logger = new Logger(WikipediaService.name);

    constructor(
        @Inject(WIKI_SUMMARY_FETCHER)
        private readonly fetchSummary: WikiSummaryFetcher,
    ) { }

    async lookup(query: string, sentences: number): Promise<EnrichmentResult> {
        const term = query.trim();
        if (!term) {
            return { ok: false, reason: 'empty', message: 'Empty query' };
        }

        try {
            const page = await this.fetchSummary(term);

            if (page.type === 'disambiguation') {
                return {
                    ok: false,
                    reason: 'ambiguous',
                    message: `The term '${term}' is ambiguous (see "${page.title}").`,
                };
            }

            const summary = firstSentences(page.extract ?? '', sentences);
            if (!summary) {
                return { ok: false, reason: 'empty', message: `Wikipedia page '${page.title}' has no summary.` };
            }

            this.logger.debug(`Wikipedia summary for "${term}" → "${page.title}" (${summary.length} chars)`);
            return { ok: true, source: SOURCE_NAME, title: page.title, summary };
        } catch (error: unknown) {
            if (isMissingPage(error)) {
                return { ok: false, reason: 'not-found', message: `No Wikipedia page found for '${term}'.` };
            }

            const detail = error instanceof Error ? error.message : String(error);
            this.logger.warn(`Wikipedia lookup failed for "${term}": ${detail}`);
            return { ok: false, reason: 'error', message: `Wikipedia lookup failed: ${detail}` };
        }
    }
}
