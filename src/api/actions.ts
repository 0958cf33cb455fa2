import { z } from 'zod';
import logger from '../util/logger';
import { paths } from '../util/constants';
import { ValidationError } from '../util/errors';
import { Session } from '../session/session';
import { IdentifierResolver } from '../scraper/resolver';

export const MIN_RATING = 0;
export const MAX_RATING = 10;

const RatingSchema = z.number().int().min(MIN_RATING).max(MAX_RATING);

export const DiaryEntrySchema = z.object({
    viewingDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Format must be YYYY-MM-DD').optional(),
    rating: RatingSchema,
    liked: z.boolean(),
    review: z.string().optional(),
    containsSpoilers: z.boolean().optional(),
    rewatch: z.boolean().optional(),
    tags: z.array(z.string().min(1)).optional(),
});

export type DiaryEntry = z.infer<typeof DiaryEntrySchema>;

function today(): string {
    return new Date().toISOString().slice(0, 10);
}

/**
 * Authenticated film mutations. Like, watch and rate endpoints are keyed by
 * the site-local id; the watchlist endpoints are keyed by slug.
 */
export class FilmActions {
    constructor(
        private readonly session: Session,
        private readonly resolver: IdentifierResolver
    ) { }

    async setLikedStatus(slug: string, status: boolean): Promise<void> {
        this.session.requireAuthenticated('update like status');
        const localId = await this.resolver.resolveSiteLocalId(slug);

        await this.session.postAction(paths.like(localId), { liked: status }, 'update like status');
        logger.info(`${slug} was successfully ${status ? 'liked' : 'unliked'}.`);
    }

    async setWatchedStatus(slug: string, status: boolean): Promise<void> {
        this.session.requireAuthenticated('update watched status');
        const localId = await this.resolver.resolveSiteLocalId(slug);

        await this.session.postAction(paths.watch(localId), { watched: status }, 'update watched status');
        logger.info(`${slug} was successfully marked as ${status ? 'watched' : 'unwatched'}.`);
    }

    async setWatchlistStatus(slug: string, status: boolean): Promise<void> {
        const operation = status ? 'add' : 'remove';
        const url = status ? paths.addToWatchlist(slug) : paths.removeFromWatchlist(slug);

        await this.session.postAction(url, {}, `${operation} watchlist entry`);
        logger.info(`${slug} was ${status ? 'added to' : 'removed from'} your watchlist.`);
    }

    async setRating(slug: string, rating: number): Promise<void> {
        if (!RatingSchema.safeParse(rating).success) {
            throw new ValidationError(`Invalid rating: ${rating}. Rating must be an integer between ${MIN_RATING} and ${MAX_RATING} (inclusive).`);
        }
        this.session.requireAuthenticated('update rating');
        const localId = await this.resolver.resolveSiteLocalId(slug);

        await this.session.postAction(paths.rate(localId), { rating }, 'update rating');
        logger.info(`${slug} was successfully rated ${rating}/${MAX_RATING}.`);
    }

    async addDiaryEntry(slug: string, entry: DiaryEntry): Promise<void> {
        const parsed = DiaryEntrySchema.safeParse(entry);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
            throw new ValidationError(`Invalid diary entry: ${issues}`, { cause: parsed.error });
        }
        const diary = parsed.data;

        this.session.requireAuthenticated('add diary entry');
        const filmId = await this.resolver.resolveSiteLocalId(slug);

        await this.session.postAction(paths.saveDiaryEntry, {
            filmId,
            specifiedDate: diary.viewingDate !== undefined,
            viewingDateStr: diary.viewingDate ?? today(),
            rating: diary.rating,
            liked: diary.liked,
            review: diary.review ?? '',
            containsSpoilers: diary.containsSpoilers ?? false,
            rewatch: diary.rewatch ?? false,
            tag: diary.tags,
        }, 'add diary entry');
        logger.info(`${slug} was added to your diary.`);
    }
}
