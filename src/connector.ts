import logger from './util/logger';
import { IdentifierCache } from './util/cache';
import { Session, HttpClient } from './session/session';
import { FilmReference, IdentifierResolver } from './scraper/resolver';
import { SearchResult, searchFilms } from './scraper/search';
import { FilmDetails, fetchFilmDetails } from './scraper/film';
import { Enriched, enrichWithCrossReferenceIds } from './scraper/enrich';
import { FilmActions } from './api/actions';
import { OperationArgs, OperationDispatcher, OperationName } from './api/operations';
import { FilmMetadataClient, FilmUserMetadata } from './api/metadata';
import { DataExportRetriever } from './api/export';
import type { Credentials } from './util/config';

export interface ConnectorConfig {
    baseUrl: string;
    cachePath: string;
    enrichConcurrency: number;
    requestTimeoutMs?: number;
}

export interface ConnectorDependencies {
    /** Replaces the axios client, e.g. with an in-process fake. */
    client?: HttpClient;
    cache?: IdentifierCache;
}

/**
 * Single entry point for callers. Holds one session and wires the resolver,
 * dispatcher, metadata client and exporter around it.
 */
export class LetterboxdConnector {
    readonly session: Session;
    readonly cache: IdentifierCache;
    readonly resolver: IdentifierResolver;
    readonly actions: FilmActions;
    readonly dispatcher: OperationDispatcher;
    readonly metadata: FilmMetadataClient;
    readonly exporter: DataExportRetriever;

    constructor(private readonly config: ConnectorConfig, deps: ConnectorDependencies = {}) {
        this.session = new Session({
            baseUrl: config.baseUrl,
            client: deps.client,
            timeoutMs: config.requestTimeoutMs,
        });
        this.cache = deps.cache ?? new IdentifierCache(config.cachePath);
        this.resolver = new IdentifierResolver(this.session, this.cache);
        this.actions = new FilmActions(this.session, this.resolver);
        this.dispatcher = new OperationDispatcher(this.session, this.actions);
        this.metadata = new FilmMetadataClient(this.session, this.resolver);
        this.exporter = new DataExportRetriever(this.session);
    }

    /**
     * Builds a connector, opens its session and logs in when credentials are
     * given. A failed login propagates.
     */
    static async connect(config: ConnectorConfig, credentials?: Credentials, deps?: ConnectorDependencies): Promise<LetterboxdConnector> {
        const connector = new LetterboxdConnector(config, deps);
        await connector.initialize();
        if (credentials) {
            await connector.login(credentials.username, credentials.password);
        } else {
            logger.info('No credentials configured. Only public operations are available.');
        }
        return connector;
    }

    get isAuthenticated(): boolean {
        return this.session.isAuthenticated;
    }

    async initialize(): Promise<void> {
        await this.session.initialize();
    }

    async login(username: string, password: string): Promise<void> {
        await this.session.login(username, password);
    }

    async search(query: string): Promise<SearchResult[]> {
        return searchFilms(this.session, query);
    }

    async filmDetails(slug: string): Promise<FilmDetails> {
        return fetchFilmDetails(this.session, slug);
    }

    async resolveFilm(slug: string): Promise<FilmReference> {
        return this.resolver.resolveFilmReference(slug);
    }

    async userMetadata(slug: string): Promise<FilmUserMetadata> {
        return this.metadata.fetchUserMetadata(slug);
    }

    perform<N extends OperationName>(name: N, slug: string, ...args: OperationArgs<N>): Promise<void>;
    perform(name: string, slug: string, ...args: unknown[]): Promise<void>;
    async perform(name: string, slug: string, ...args: unknown[]): Promise<void> {
        return this.dispatcher.perform(name, slug, ...args);
    }

    async enrich<T extends { url: string }>(rows: readonly T[], transient = false): Promise<Enriched<T>[]> {
        return enrichWithCrossReferenceIds(rows, this.resolver, {
            concurrency: this.config.enrichConcurrency,
            transient,
        });
    }

    async downloadExport(destinationDir: string): Promise<string> {
        return this.exporter.downloadAndExtract(destinationDir);
    }

    clearCache(namespace?: string, key?: string): number {
        const removed = this.cache.clear(namespace, key);
        logger.info(`Cleared ${removed} cached identifier(s).`);
        return removed;
    }
}
