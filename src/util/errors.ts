/**
 * Base class for everything the connector raises. `cause` keeps the
 * underlying transport or parser error when there is one.
 */
export class LetterboxdError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Login failed, or an authenticated action was attempted anonymously. */
export class AuthenticationError extends LetterboxdError {}

/** Non-200 response, transport failure, or a falsy `result` flag. */
export class ConnectionError extends LetterboxdError {}

/** An element or attribute the scraper relies on is missing from the page. */
export class ScrapeError extends LetterboxdError {}

/** The TMDb link on a film page points at something other than a movie. */
export class UnsupportedCategoryError extends LetterboxdError {
    constructor(public readonly category: string, options?: { cause?: unknown }) {
        super(`Found TMDb link with category '${category}'. Only 'movie' is supported.`, options);
    }
}

/** A caller-supplied argument is out of contract. */
export class ValidationError extends LetterboxdError {}

export class UnknownOperationError extends ValidationError {
    constructor(public readonly operation: string) {
        super(`Operation '${operation}' is not registered.`);
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
