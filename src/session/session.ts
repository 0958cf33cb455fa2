import axios, { AxiosRequestConfig, AxiosResponse, ResponseType } from 'axios';
import { CookieJar } from 'tough-cookie';
import { z } from 'zod';
import logger from '../util/logger';
import { CSRF_COOKIE_NAME, CSRF_FIELD, DEFAULT_BASE_URL, paths } from '../util/constants';
import { AuthenticationError, ConnectionError, ValidationError, describeError } from '../util/errors';

export type HttpResponse = Pick<AxiosResponse<unknown>, 'status' | 'headers' | 'data'>;

/**
 * The slice of axios the session needs. Tests hand in an in-process fake.
 */
export interface HttpClient {
    request(config: AxiosRequestConfig): Promise<HttpResponse>;
}

export interface SessionOptions {
    baseUrl?: string;
    client?: HttpClient;
    timeoutMs?: number;
    userAgent?: string;
}

export type FormValue = string | number | boolean | readonly string[] | undefined;
export type FormFields = Record<string, FormValue>;

interface RequestOptions {
    data?: string;
    headers?: Record<string, string>;
    responseType?: ResponseType;
}

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

const LoginResponseSchema = z.object({ result: z.unknown() });
const ResultFlagSchema = z.object({ result: z.literal(true) });

/**
 * Owns the HTTP client and the cookie jar for one connector instance.
 *
 * The site has no API tokens; authentication lives entirely in cookies, and
 * every mutating form post must echo the anti-forgery cookie back as a field.
 */
export class Session {
    readonly baseUrl: string;
    private readonly client: HttpClient;
    private readonly jar = new CookieJar();
    private authenticated = false;

    constructor(options: SessionOptions = {}) {
        this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
        this.client = options.client ?? axios.create({
            timeout: options.timeoutMs,
            headers: { 'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT },
            // Status codes are checked by the caller, not thrown
            validateStatus: () => true,
        });
    }

    get isAuthenticated(): boolean {
        return this.authenticated;
    }

    /**
     * Hits the site root once to collect the session and anti-forgery cookies.
     */
    async initialize(): Promise<void> {
        const response = await this.get('/');
        expectOk(response, 'initialize session');
        logger.info(`Session initialized with ${this.baseUrl}.`);
    }

    async login(username: string, password: string): Promise<void> {
        if (!username || !password) {
            throw new ValidationError('Username and password must be provided to log in.');
        }

        let response: HttpResponse;
        try {
            response = await this.postForm(paths.login, {
                username,
                password,
                [CSRF_FIELD]: await this.csrfToken(),
            });
        } catch (e: unknown) {
            if (e instanceof AuthenticationError) throw e;
            logger.error(`Login request failed: ${describeError(e)}`);
            throw new AuthenticationError(`Login request failed: ${describeError(e)}`, { cause: e });
        }

        const parsed = LoginResponseSchema.safeParse(response.data);
        const result = parsed.success ? parsed.data.result : undefined;
        if (response.status !== 200 || result !== 'success') {
            logger.error(`Login failed for '${username}' (status ${response.status}, result ${JSON.stringify(result)})`);
            throw new AuthenticationError('Login failed. Please check your credentials.');
        }

        this.authenticated = true;
        logger.info(`Successfully logged in as '${username}'.`);
    }

    /**
     * Reads the anti-forgery token from the jar. The site rotates it, so it is
     * looked up again on every call rather than remembered.
     */
    async csrfToken(): Promise<string> {
        const cookies = await this.jar.getCookies(this.baseUrl);
        const token = cookies.find(cookie => cookie.key === CSRF_COOKIE_NAME)?.value;
        if (!token) {
            throw new AuthenticationError('Session has no anti-forgery token. Call initialize() first.');
        }
        return token;
    }

    requireAuthenticated(action: string): void {
        if (!this.authenticated) {
            throw new AuthenticationError(`User must be logged in to ${action}.`);
        }
    }

    async get(pathOrUrl: string, responseType?: ResponseType): Promise<HttpResponse> {
        return this.request('GET', pathOrUrl, { responseType });
    }

    async postForm(pathOrUrl: string, fields: FormFields): Promise<HttpResponse> {
        return this.request('POST', pathOrUrl, {
            data: encodeForm(fields),
            headers: {
                'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
                'X-Requested-With': 'XMLHttpRequest',
            },
        });
    }

    /**
     * Authenticated form post that carries a freshly read token and must come
     * back with `{ result: true }`.
     */
    async postAction(pathOrUrl: string, fields: FormFields, what: string): Promise<HttpResponse> {
        this.requireAuthenticated(what);
        const response = await this.postForm(pathOrUrl, {
            ...fields,
            [CSRF_FIELD]: await this.csrfToken(),
        });
        expectResultFlag(response, what);
        return response;
    }

    resolveUrl(pathOrUrl: string): string {
        return new URL(pathOrUrl, this.baseUrl).toString();
    }

    private async request(method: 'GET' | 'POST', pathOrUrl: string, init: RequestOptions): Promise<HttpResponse> {
        const url = this.resolveUrl(pathOrUrl);
        const cookie = await this.jar.getCookieString(url);
        const headers: Record<string, string> = { ...init.headers };
        if (cookie) headers.Cookie = cookie;

        let response: HttpResponse;
        try {
            response = await this.client.request({ method, url, data: init.data, headers, responseType: init.responseType });
        } catch (e: unknown) {
            throw new ConnectionError(`${method} ${url} failed: ${describeError(e)}`, { cause: e });
        }

        logger.debug(`${method} ${url} -> ${response.status}`);
        await this.storeCookies(url, response);
        return response;
    }

    private async storeCookies(url: string, response: HttpResponse): Promise<void> {
        const raw: unknown = response.headers['set-cookie'];
        const cookies = Array.isArray(raw) ? raw : [raw];
        for (const cookie of cookies) {
            if (typeof cookie !== 'string') continue;
            await this.jar.setCookie(cookie, url, { ignoreError: true });
        }
    }
}

export function encodeForm(fields: FormFields): string {
    const params = new URLSearchParams();
    for (const [name, value] of Object.entries(fields)) {
        if (value === undefined) continue;
        if (Array.isArray(value)) {
            value.forEach(item => params.append(name, item));
        } else {
            params.append(name, String(value));
        }
    }
    return params.toString();
}

export function headerValue(response: HttpResponse, name: string): string | undefined {
    const wanted = name.toLowerCase();
    for (const [key, value] of Object.entries(response.headers)) {
        if (key.toLowerCase() === wanted) {
            return typeof value === 'string' ? value : undefined;
        }
    }
    return undefined;
}

export function expectOk(response: HttpResponse, what: string): void {
    if (response.status !== 200) {
        throw new ConnectionError(`Failed to ${what}: HTTP ${response.status}`);
    }
}

export function expectResultFlag(response: HttpResponse, what: string): void {
    expectOk(response, what);
    if (!ResultFlagSchema.safeParse(response.data).success) {
        logger.error(`Request to ${what} was rejected: ${JSON.stringify(response.data)}`);
        throw new ConnectionError(`Failed to ${what}.`);
    }
}
