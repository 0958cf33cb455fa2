import fs from 'fs';
import os from 'os';
import path from 'path';
import { OPERATIONS, OperationDispatcher, availableOperations, describeOperation, isOperationName } from './operations';
import { FilmActions } from './actions';
import { IdentifierResolver } from '../scraper/resolver';
import { IdentifierCache } from '../util/cache';
import { Session } from '../session/session';
import { AuthenticationError, UnknownOperationError, ValidationError } from '../util/errors';
import { BASE_URL, siteWithLogin } from '../../tests/fakeSite';

jest.mock('../util/logger', () => ({
    __esModule: true,
    default: {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    },
}));

describe('operation registry', () => {
    it('should list the eight supported operations', () => {
        expect(Object.keys(OPERATIONS)).toHaveLength(8);
        expect(isOperationName('Add to watchlist')).toBe(true);
        expect(isOperationName('toString')).toBe(false);
    });

    it('should describe toggles with the status they apply', () => {
        expect(describeOperation('Un-mark film as watched')).toEqual({ kind: 'watched', status: false });
        expect(describeOperation('Add to Liked films')).toEqual({ kind: 'liked', status: true });
    });

    it('should reject an unknown name', () => {
        expect(() => describeOperation('Add to favourites')).toThrow(UnknownOperationError);
    });
});

describe('availableOperations', () => {
    it('should offer the opposite of every toggle the user has set', () => {
        expect(availableOperations({ watched: true, liked: false, watchlisted: true, rating: 8 })).toEqual([
            'Un-mark film as watched',
            'Add to Liked films',
            'Remove from watchlist',
            'Update film rating',
            'Add to diary',
        ]);
    });

    it('should offer every add operation for an untouched film', () => {
        expect(availableOperations({ watched: false, liked: false, watchlisted: false, rating: null })).toEqual([
            'Mark film as watched',
            'Add to Liked films',
            'Add to watchlist',
            'Update film rating',
            'Add to diary',
        ]);
    });
});

describe('OperationDispatcher', () => {
    let dir: string;
    let session: Session;
    let actions: FilmActions;
    let dispatcher: OperationDispatcher;

    beforeEach(async () => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'boxd-operations-'));
        session = new Session({ baseUrl: BASE_URL, client: siteWithLogin() });
        await session.initialize();

        const resolver = new IdentifierResolver(session, new IdentifierCache(path.join(dir, 'cache.sqlite')));
        actions = new FilmActions(session, resolver);
        jest.spyOn(actions, 'setLikedStatus').mockResolvedValue();
        jest.spyOn(actions, 'setWatchedStatus').mockResolvedValue();
        jest.spyOn(actions, 'setWatchlistStatus').mockResolvedValue();
        jest.spyOn(actions, 'setRating').mockResolvedValue();
        jest.spyOn(actions, 'addDiaryEntry').mockResolvedValue();
        dispatcher = new OperationDispatcher(session, actions);
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should refuse every operation while anonymous', async () => {
        await expect(dispatcher.perform('Add to watchlist', 'seven-samurai')).rejects.toThrow(AuthenticationError);
        expect(actions.setWatchlistStatus).not.toHaveBeenCalled();
    });

    it('should check the session before the operation name', async () => {
        await expect(dispatcher.perform('Add to favourites', 'seven-samurai')).rejects.toThrow(AuthenticationError);
    });

    describe('when logged in', () => {
        beforeEach(async () => {
            await session.login('test-user', 'test-password');
        });

        it('should reject an unknown operation', async () => {
            await expect(dispatcher.perform('Add to favourites', 'seven-samurai')).rejects.toThrow(UnknownOperationError);
        });

        it.each([
            ['Add to Liked films', 'setLikedStatus', true],
            ['Remove from liked films', 'setLikedStatus', false],
            ['Mark film as watched', 'setWatchedStatus', true],
            ['Un-mark film as watched', 'setWatchedStatus', false],
            ['Add to watchlist', 'setWatchlistStatus', true],
            ['Remove from watchlist', 'setWatchlistStatus', false],
        ] as const)('should route %s to %s(%p)', async (name, method, status) => {
            await dispatcher.perform(name, 'seven-samurai');

            expect(actions[method]).toHaveBeenCalledWith('seven-samurai', status);
        });

        it('should pass the rating through', async () => {
            await dispatcher.perform('Update film rating', 'seven-samurai', 10);

            expect(actions.setRating).toHaveBeenCalledWith('seven-samurai', 10);
        });

        it('should reject a rating that is not a number', async () => {
            await expect(dispatcher.perform('Update film rating', 'seven-samurai', '10')).rejects.toThrow(ValidationError);
            expect(actions.setRating).not.toHaveBeenCalled();
        });

        it('should pass a valid diary entry through', async () => {
            const entry = { viewingDate: '2026-10-01', rating: 8, liked: true };

            await dispatcher.perform('Add to diary', 'seven-samurai', entry);

            expect(actions.addDiaryEntry).toHaveBeenCalledWith('seven-samurai', entry);
        });

        it('should reject a diary entry without a rating', async () => {
            await expect(dispatcher.perform('Add to diary', 'seven-samurai', { liked: true })).rejects.toThrow(ValidationError);
            expect(actions.addDiaryEntry).not.toHaveBeenCalled();
        });
    });
});
