import PQueue from 'p-queue';
import logger from '../util/logger';
import { runInJob } from '../util/context';
import { describeError } from '../util/errors';
import { IdentifierResolver } from './resolver';

export interface EnrichOptions {
    concurrency: number;
    /** Rows point at diary entries rather than film pages. */
    transient?: boolean;
}

export type Enriched<T> = T & { tmdbId: number | null };

/**
 * Attaches a TMDb id to every row that links to a Letterboxd page. A row whose
 * id cannot be resolved gets `null` and the rest carry on.
 */
export async function enrichWithCrossReferenceIds<T extends { url: string }>(
    rows: readonly T[],
    resolver: IdentifierResolver,
    options: EnrichOptions
): Promise<Enriched<T>[]> {
    const queue = new PQueue({ concurrency: options.concurrency });
    let failures = 0;

    logger.info(`Resolving TMDb ids for ${rows.length} rows...`);

    const enriched = await Promise.all(rows.map(row => queue.add<Enriched<T>>(() =>
        runInJob(row.url, async (): Promise<Enriched<T>> => {
            try {
                const tmdbId = await resolver.resolveCrossReferenceId(row.url, options.transient ?? false);
                return { ...row, tmdbId };
            } catch (e: unknown) {
                failures++;
                logger.warn(`No TMDb id for ${row.url}: ${describeError(e)}`);
                return { ...row, tmdbId: null };
            }
        })
    )));

    if (failures > 0) {
        logger.warn(`Resolved ${rows.length - failures}/${rows.length} TMDb ids.`);
    }
    return enriched;
}
