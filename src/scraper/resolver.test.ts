import fs from 'fs';
import os from 'os';
import path from 'path';
import { IdentifierResolver, cacheKeyForUrl } from './resolver';
import { IdentifierCache } from '../util/cache';
import { Session } from '../session/session';
import { ConnectionError, ScrapeError, UnsupportedCategoryError } from '../util/errors';
import { BASE_URL, FakeSite, diaryEntryPage, filmPage, html, sidebarPage } from '../../tests/fakeSite';

jest.mock('../util/logger', () => ({
    __esModule: true,
    default: {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    },
}));

const FILM_URL = 'https://letterboxd.com/film/seven-samurai/';

describe('cacheKeyForUrl', () => {
    it('should use the slug of a film page', () => {
        expect(cacheKeyForUrl('https://letterboxd.com/film/seven-samurai/')).toBe('seven-samurai');
    });

    it('should use the slug of a diary entry, rewatch counter included', () => {
        expect(cacheKeyForUrl('https://letterboxd.com/test-user/film/seven-samurai/2/')).toBe('seven-samurai');
    });

    it('should fall back to the last path segment', () => {
        expect(cacheKeyForUrl('https://boxd.it/1a2b')).toBe('1a2b');
    });
});

describe('IdentifierResolver', () => {
    let dir: string;
    let cache: IdentifierCache;
    let site: FakeSite;
    let resolver: IdentifierResolver;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'boxd-resolver-'));
        cache = new IdentifierCache(path.join(dir, 'cache.sqlite'));
        site = new FakeSite();
        resolver = new IdentifierResolver(new Session({ baseUrl: BASE_URL, client: site }), cache);
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('resolveSiteLocalId', () => {
        it('should scrape the rateable uid and cache it', async () => {
            site.on('GET', '/csi/film/seven-samurai/sidebar-user-actions/?esiAllowUser=true', html(sidebarPage(51935)));

            await expect(resolver.resolveSiteLocalId('seven-samurai')).resolves.toBe(51935);
            expect(cache.get('slug_to_local_id', 'seven-samurai')).toBe(51935);
        });

        it('should answer from the cache without a request', async () => {
            cache.save('slug_to_local_id', 'seven-samurai', 51935);

            await expect(resolver.resolveSiteLocalId('seven-samurai')).resolves.toBe(51935);
            expect(site.count()).toBe(0);
        });

        it('should raise a scrape error when the rating form is missing', async () => {
            site.on('GET', '/csi/film/nope/sidebar-user-actions/?esiAllowUser=true', html('<html><body></body></html>'));

            await expect(resolver.resolveSiteLocalId('nope')).rejects.toThrow(ScrapeError);
            expect(cache.get('slug_to_local_id', 'nope')).toBeNull();
        });

        it('should raise a connection error on a 404', async () => {
            site.on('GET', '/csi/film/nope/sidebar-user-actions/?esiAllowUser=true', html('not found', 404));

            await expect(resolver.resolveSiteLocalId('nope')).rejects.toThrow(ConnectionError);
        });
    });

    describe('resolveCrossReferenceId', () => {
        it('should resolve seven-samurai to 346 and cache it under its slug', async () => {
            site.on('GET', FILM_URL, html(filmPage('https://www.themoviedb.org/movie/346/')));

            await expect(resolver.resolveCrossReferenceIdForSlug('seven-samurai')).resolves.toBe(346);
            expect(cache.get('url_to_xref_id', 'seven-samurai')).toBe(346);
            expect(site.count()).toBe(1);

            await expect(resolver.resolveCrossReferenceIdForSlug('seven-samurai')).resolves.toBe(346);
            expect(site.count()).toBe(1);
        });

        it('should reject a tv link and cache nothing', async () => {
            site.on('GET', '/film/cowboy-bebop/', html(filmPage('https://www.themoviedb.org/tv/30991/', 'Cowboy Bebop')));

            await expect(resolver.resolveCrossReferenceId('https://letterboxd.com/film/cowboy-bebop/'))
                .rejects.toThrow(UnsupportedCategoryError);
            expect(cache.get('url_to_xref_id', 'cowboy-bebop')).toBeNull();
        });

        it('should raise a scrape error when there is no TMDb link', async () => {
            site.on('GET', FILM_URL, html('<html><body><h1>Seven Samurai</h1></body></html>'));

            await expect(resolver.resolveCrossReferenceId(FILM_URL)).rejects.toThrow(ScrapeError);
            expect(cache.get('url_to_xref_id', 'seven-samurai')).toBeNull();
        });

        it('should follow a diary entry to the film page', async () => {
            const diaryUrl = 'https://letterboxd.com/test-user/film/seven-samurai/';
            site.on('GET', diaryUrl, html(diaryEntryPage('/film/seven-samurai/')));
            site.on('GET', FILM_URL, html(filmPage('https://www.themoviedb.org/movie/346/')));

            await expect(resolver.resolveCrossReferenceId(diaryUrl, true)).resolves.toBe(346);
            expect(site.requests.map(r => r.url)).toEqual([diaryUrl, FILM_URL]);
            expect(cache.get('url_to_xref_id', 'seven-samurai')).toBe(346);
        });

        it('should raise a scrape error when a diary entry has no film link', async () => {
            const diaryUrl = 'https://letterboxd.com/test-user/film/seven-samurai/';
            site.on('GET', diaryUrl, html('<html><body></body></html>'));

            await expect(resolver.resolveCrossReferenceId(diaryUrl, true)).rejects.toThrow(ScrapeError);
            expect(site.count()).toBe(1);
        });
    });

    describe('resolveFilmReference', () => {
        it('should resolve both halves', async () => {
            site.on('GET', '/csi/film/seven-samurai/sidebar-user-actions/?esiAllowUser=true', html(sidebarPage(51935)));
            site.on('GET', FILM_URL, html(filmPage('https://www.themoviedb.org/movie/346/')));

            await expect(resolver.resolveFilmReference('seven-samurai'))
                .resolves.toEqual({ slug: 'seven-samurai', localId: 51935, tmdbId: 346 });
        });
    });
});
