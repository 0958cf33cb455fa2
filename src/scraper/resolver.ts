import * as cheerio from 'cheerio';
import logger from '../util/logger';
import { IdentifierCache } from '../util/cache';
import { LOCAL_ID_NAMESPACE, SUPPORTED_TMDB_CATEGORY, XREF_ID_NAMESPACE, paths } from '../util/constants';
import { ScrapeError, UnsupportedCategoryError } from '../util/errors';
import { Session, expectOk } from '../session/session';

/** Both identifiers of one film. Each half is cached on its own. */
export interface FilmReference {
    slug: string;
    localId: number;
    tmdbId: number;
}

/**
 * Canonical cache key for a Letterboxd page: the film slug. Film pages
 * (`/film/<slug>/`) and diary entries (`/<user>/film/<slug>/<n>/`) of the
 * same film share one key. URLs without a `film` segment fall back to their
 * last path segment.
 */
export function cacheKeyForUrl(pageUrl: string): string {
    const segments = new URL(pageUrl, 'https://letterboxd.com').pathname.split('/').filter(Boolean);
    const filmIndex = segments.lastIndexOf('film');
    const key = filmIndex >= 0 && filmIndex < segments.length - 1
        ? segments[filmIndex + 1]
        : segments[segments.length - 1];

    if (!key) {
        throw new ScrapeError(`Cannot derive a cache key from ${pageUrl}`);
    }
    return key;
}

/**
 * Turns film slugs and page URLs into the numeric identifiers the site's
 * endpoints and TMDb need, scraping on a cache miss.
 */
export class IdentifierResolver {
    constructor(
        private readonly session: Session,
        private readonly cache: IdentifierCache
    ) { }

    /**
     * Letterboxd's internal film id, read from the `film:<id>` uid of the
     * sidebar rating form.
     */
    async resolveSiteLocalId(slug: string): Promise<number> {
        const cached = this.cache.get(LOCAL_ID_NAMESPACE, slug);
        if (cached !== null) {
            logger.debug(`[CACHE HIT] Local id for ${slug}: ${cached}`);
            return cached;
        }

        logger.debug(`Fetching local id for ${slug}`);
        const response = await this.session.get(paths.sidebarActions(slug));
        expectOk(response, `fetch sidebar for '${slug}'`);

        const $ = cheerio.load(pageText(response.data));
        const uid = $('#frm-sidebar-rating').attr('data-rateable-uid');
        if (!uid) {
            throw new ScrapeError(`Could not find the rateable uid for '${slug}'. The slug may be wrong or the page layout changed.`);
        }

        const suffix = uid.split(':', 2)[1];
        if (!suffix || !/^\d+$/.test(suffix)) {
            throw new ScrapeError(`Unexpected rateable uid '${uid}' for '${slug}'`);
        }

        const localId = parseInt(suffix, 10);
        this.cache.save(LOCAL_ID_NAMESPACE, slug, localId);
        logger.info(`Resolved local id ${localId} for ${slug}`);
        return localId;
    }

    /**
     * TMDb id linked from a film page.
     *
     * @param isTransientPage - the page is a contextual view (a diary entry)
     *   without the TMDb link; its title link is followed to the film page first.
     */
    async resolveCrossReferenceId(pageUrl: string, isTransientPage = false): Promise<number> {
        const key = cacheKeyForUrl(pageUrl);
        const cached = this.cache.get(XREF_ID_NAMESPACE, key);
        if (cached !== null) {
            logger.debug(`[CACHE HIT] TMDb id for ${key}: ${cached}`);
            return cached;
        }

        logger.debug(`Fetching TMDb id from ${pageUrl} (transient: ${isTransientPage})`);
        let $ = await this.fetchPage(pageUrl);

        if (isTransientPage) {
            const filmHref = $('.film-title-wrapper a').first().attr('href');
            if (!filmHref) {
                throw new ScrapeError(`No film link found on transient page ${pageUrl}`);
            }
            logger.debug(`Following ${pageUrl} to film page ${filmHref}`);
            $ = await this.fetchPage(filmHref);
        }

        const tmdbId = extractTmdbId($, pageUrl);
        this.cache.save(XREF_ID_NAMESPACE, key, tmdbId);
        logger.info(`Resolved TMDb id ${tmdbId} for ${key}`);
        return tmdbId;
    }

    async resolveCrossReferenceIdForSlug(slug: string): Promise<number> {
        return this.resolveCrossReferenceId(this.session.resolveUrl(paths.filmPage(slug)));
    }

    async resolveFilmReference(slug: string): Promise<FilmReference> {
        const localId = await this.resolveSiteLocalId(slug);
        const tmdbId = await this.resolveCrossReferenceIdForSlug(slug);
        return { slug, localId, tmdbId };
    }

    private async fetchPage(pageUrl: string): Promise<cheerio.CheerioAPI> {
        const response = await this.session.get(pageUrl);
        expectOk(response, `fetch ${pageUrl}`);
        return cheerio.load(pageText(response.data));
    }
}

function extractTmdbId($: cheerio.CheerioAPI, pageUrl: string): number {
    const href = $('a[data-track-action="TMDb" i]').first().attr('href');
    if (!href) {
        throw new ScrapeError(`No TMDb link found on ${pageUrl}`);
    }

    // https://www.themoviedb.org/movie/346/
    const segments = new URL(href, 'https://www.themoviedb.org').pathname.split('/').filter(Boolean);
    const id = segments[segments.length - 1];
    const category = segments[segments.length - 2];

    if (category !== SUPPORTED_TMDB_CATEGORY) {
        throw new UnsupportedCategoryError(category ?? '');
    }
    if (!id || !/^\d+$/.test(id)) {
        throw new ScrapeError(`Could not extract a TMDb id from ${href}`);
    }

    return parseInt(id, 10);
}

export function pageText(data: unknown): string {
    if (typeof data === 'string') return data;
    if (Buffer.isBuffer(data)) return data.toString('utf8');
    throw new ScrapeError('Expected an HTML page but the response body was not text');
}
