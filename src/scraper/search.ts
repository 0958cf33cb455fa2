import * as cheerio from 'cheerio';
import logger from '../util/logger';
import { paths } from '../util/constants';
import { Session, expectOk } from '../session/session';
import { cacheKeyForUrl, pageText } from './resolver';

export interface SearchResult {
    title: string;
    year: number | null;
    director: string | null;
    slug: string;
    url: string;
}

/**
 * Runs a film search and returns the hits in the order the site ranks them.
 * An empty list means nothing matched.
 */
export async function searchFilms(session: Session, query: string): Promise<SearchResult[]> {
    logger.info(`Searching for films with query: ${query}`);
    const response = await session.get(paths.search(query));
    expectOk(response, `search for '${query}'`);

    const $ = cheerio.load(pageText(response.data));
    const results: SearchResult[] = [];

    $('.film-detail-content').each((_, element) => {
        const film = $(element);
        const link = film.find('h2 span a').first();
        const href = link.attr('href');
        if (!href) return;

        const yearText = film.find('h2 span small a').first().text().trim();
        const director = film.find('p a').first().text().trim();

        results.push({
            title: link.text().trim(),
            year: /^\d{4}$/.test(yearText) ? parseInt(yearText, 10) : null,
            director: director || null,
            slug: cacheKeyForUrl(href),
            url: session.resolveUrl(href),
        });
    });

    if (results.length === 0) {
        logger.warn(`No results found for query: ${query}`);
    } else {
        logger.info(`Found ${results.length} results for query: ${query}`);
    }
    return results;
}

/** `Seven Samurai (1954) - Akira Kurosawa` */
export function formatSearchResult(result: SearchResult): string {
    const year = result.year !== null ? ` (${result.year})` : '';
    const director = result.director ? ` - ${result.director}` : '';
    return `${result.title}${year}${director}`;
}
