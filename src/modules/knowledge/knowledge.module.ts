import { Module } from '@nestjs/common';
import wiki from 'wikipedia';
import { ENRICHMENT_CLIENT } from './enrichment/enrichment-client.interface';
import { WikipediaService } from './wikipedia.service';
import { WIKI_SUMMARY_FETCHER, type WikiSummaryFetcher } from './wikipedia.types';

// Auto-suggest and redirects on, so loose queries still land on a page
const fetchWikiSummary: WikiSummaryFetcher = (query) =>
    wiki.summary(query, { autoSuggest: true, redirect: true });

/**
 * Knowledge Module
 *
 * Provides the context source used by knowledge mode.
 */
@Module({
    providers: [
        { provide: WIKI_SUMMARY_FETCHER, useValue: fetchWikiSummary },
        WikipediaService,
        { provide: ENRICHMENT_CLIENT, useExisting: WikipediaService },
    ],
    exports: [ENRICHMENT_CLIENT],
})
export class KnowledgeModule { }
