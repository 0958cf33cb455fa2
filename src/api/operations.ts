import logger from '../util/logger';
import { UnknownOperationError, ValidationError } from '../util/errors';
import { Session } from '../session/session';
import { DiaryEntry, DiaryEntrySchema, FilmActions } from './actions';
import type { FilmUserMetadata } from './metadata';

export type OperationDescriptor =
    | { kind: 'liked'; status: boolean }
    | { kind: 'watched'; status: boolean }
    | { kind: 'watchlist'; status: boolean }
    | { kind: 'rating' }
    | { kind: 'diary' };

export type OperationKind = OperationDescriptor['kind'];

/**
 * User-facing operation names. Toggle operations carry the status the
 * dispatcher passes to their handler.
 */
export const OPERATIONS = {
    'Add to diary': { kind: 'diary' },
    'Update film rating': { kind: 'rating' },
    'Add to Liked films': { kind: 'liked', status: true },
    'Remove from liked films': { kind: 'liked', status: false },
    'Mark film as watched': { kind: 'watched', status: true },
    'Un-mark film as watched': { kind: 'watched', status: false },
    'Add to watchlist': { kind: 'watchlist', status: true },
    'Remove from watchlist': { kind: 'watchlist', status: false },
} as const satisfies Record<string, OperationDescriptor>;

export type OperationName = keyof typeof OPERATIONS;

type ArgsFor<K extends OperationKind> =
    K extends 'rating' ? [rating: number] :
    K extends 'diary' ? [entry: DiaryEntry] :
    [];

export type OperationArgs<N extends OperationName> = ArgsFor<(typeof OPERATIONS)[N]['kind']>;

export function isOperationName(name: string): name is OperationName {
    return Object.prototype.hasOwnProperty.call(OPERATIONS, name);
}

export function describeOperation(name: string): OperationDescriptor {
    if (!isOperationName(name)) {
        throw new UnknownOperationError(name);
    }
    return OPERATIONS[name];
}

/**
 * The operations worth offering for a film given what the user has already
 * done with it. Rating and diary are always offered.
 */
export function availableOperations(metadata: FilmUserMetadata): OperationName[] {
    return [
        metadata.watched ? 'Un-mark film as watched' : 'Mark film as watched',
        metadata.liked ? 'Remove from liked films' : 'Add to Liked films',
        metadata.watchlisted ? 'Remove from watchlist' : 'Add to watchlist',
        'Update film rating',
        'Add to diary',
    ];
}

export class OperationDispatcher {
    constructor(
        private readonly session: Session,
        private readonly actions: FilmActions
    ) { }

    perform<N extends OperationName>(name: N, slug: string, ...args: OperationArgs<N>): Promise<void>;
    perform(name: string, slug: string, ...args: unknown[]): Promise<void>;
    async perform(name: string, slug: string, ...args: unknown[]): Promise<void> {
        this.session.requireAuthenticated(`perform '${name}'`);
        const descriptor = describeOperation(name);

        logger.info(`Performing operation: ${name} (${slug})`);
        switch (descriptor.kind) {
            case 'liked':
                return this.actions.setLikedStatus(slug, descriptor.status);
            case 'watched':
                return this.actions.setWatchedStatus(slug, descriptor.status);
            case 'watchlist':
                return this.actions.setWatchlistStatus(slug, descriptor.status);
            case 'rating': {
                const [rating] = args;
                if (typeof rating !== 'number') {
                    throw new ValidationError(`'${name}' needs a numeric rating`);
                }
                return this.actions.setRating(slug, rating);
            }
            case 'diary': {
                const parsed = DiaryEntrySchema.safeParse(args[0]);
                if (!parsed.success) {
                    throw new ValidationError(`'${name}' needs a valid diary entry`, { cause: parsed.error });
                }
                return this.actions.addDiaryEntry(slug, parsed.data);
            }
        }
    }
}
