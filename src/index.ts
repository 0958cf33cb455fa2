require('dotenv').config();

import { loadConfig, toConnectorConfig } from './util/config';
import logger from './util/logger';
import { describeError } from './util/errors';
import { LetterboxdConnector } from './connector';

export { LetterboxdConnector } from './connector';
export type { ConnectorConfig, ConnectorDependencies } from './connector';
export { Session } from './session/session';
export type { HttpClient, HttpResponse, SessionOptions } from './session/session';
export { IdentifierCache } from './util/cache';
export { IdentifierResolver, cacheKeyForUrl } from './scraper/resolver';
export type { FilmReference } from './scraper/resolver';
export { FilmActions, MIN_RATING, MAX_RATING } from './api/actions';
export type { DiaryEntry } from './api/actions';
export { OPERATIONS, OperationDispatcher, availableOperations, isOperationName } from './api/operations';
export type { OperationName, OperationArgs, OperationDescriptor } from './api/operations';
export { FilmMetadataClient } from './api/metadata';
export type { FilmUserMetadata } from './api/metadata';
export { DataExportRetriever } from './api/export';
export { searchFilms, formatSearchResult } from './scraper/search';
export type { SearchResult } from './scraper/search';
export { fetchFilmDetails } from './scraper/film';
export type { FilmDetails } from './scraper/film';
export { enrichWithCrossReferenceIds } from './scraper/enrich';
export type { Enriched } from './scraper/enrich';
export { loadConfig, toConnectorConfig } from './util/config';
export type { AppConfig, Credentials } from './util/config';
export * from './util/errors';

/**
 * Logs in with the configured account and pulls a fresh copy of the data
 * export. Without credentials there is nothing to pull.
 */
export async function main(): Promise<void> {
    try {
        const config = loadConfig();
        const connector = await LetterboxdConnector.connect(toConnectorConfig(config), config.credentials);

        if (!connector.isAuthenticated) {
            logger.warn('Set LETTERBOXD_USERNAME and LETTERBOXD_PASSWORD to download your data export.');
            return;
        }

        const extracted = await connector.downloadExport(config.exportDir);
        logger.info(`Export ready in ${extracted}`);
    } catch (e: unknown) {
        logger.error(`Run failed: ${describeError(e)}`);
        process.exitCode = 1;
    }
}

if (require.main === module) {
    void main();
}
