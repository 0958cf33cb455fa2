import { z } from 'zod';
import logger from '../util/logger';
import { paths } from '../util/constants';
import { ConnectionError } from '../util/errors';
import { FormFields, Session, expectResultFlag } from '../session/session';
import { IdentifierResolver } from '../scraper/resolver';

export interface FilmUserMetadata {
    watched: boolean;
    liked: boolean;
    watchlisted: boolean;
    rating: number | null;
}

const MetadataResponseSchema = z.object({
    watchables: z.array(z.object({ watched: z.boolean().optional() }).passthrough()).default([]),
    likeables: z.array(z.object({ liked: z.boolean().optional() }).passthrough()).default([]),
    rateables: z.array(z.object({ rating: z.number().nullable().optional() }).passthrough()).default([]),
    filmsInWatchlist: z.unknown().optional(),
});

const DETAIL_KINDS = ['posters', 'likeables', 'watchables', 'rateables'] as const;

/**
 * Reads what the logged-in user has done with a film, through the same ajax
 * endpoint the site's film pages use.
 */
export class FilmMetadataClient {
    constructor(
        private readonly session: Session,
        private readonly resolver: IdentifierResolver
    ) { }

    async fetchUserMetadata(slug: string): Promise<FilmUserMetadata> {
        this.session.requireAuthenticated('fetch personalized metadata');
        const localId = await this.resolver.resolveSiteLocalId(slug);

        const fields = metadataFields(localId);
        const response = await this.session.postForm(paths.metadata, fields);
        expectResultFlag(response, `fetch metadata for '${slug}'`);

        const result = MetadataResponseSchema.safeParse(response.data);
        if (!result.success) {
            throw new ConnectionError(`Metadata response for '${slug}' has an unexpected shape`, { cause: result.error });
        }
        const parsed = result.data;
        const ratingEntry = parsed.rateables.find(item => typeof item.rating === 'number');

        const metadata: FilmUserMetadata = {
            watched: parsed.watchables.some(item => item.watched === true),
            liked: parsed.likeables.some(item => item.liked === true),
            watchlisted: isNonEmpty(parsed.filmsInWatchlist),
            rating: ratingEntry?.rating ?? null,
        };
        logger.info(`Fetched metadata for '${slug}': ${JSON.stringify(metadata)}`);
        return metadata;
    }
}

export function metadataFields(localId: number): FormFields {
    const uid = `film:${localId}`;
    const fields: FormFields = {};
    for (const kind of DETAIL_KINDS) {
        fields[kind] = uid;
    }
    return fields;
}

function isNonEmpty(value: unknown): boolean {
    if (Array.isArray(value)) return value.length > 0;
    if (value !== null && typeof value === 'object') return Object.keys(value).length > 0;
    return Boolean(value);
}
