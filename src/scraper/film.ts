import * as cheerio from 'cheerio';
import JSON5 from 'json5';
import { z } from 'zod';
import logger from '../util/logger';
import { paths } from '../util/constants';
import { describeError } from '../util/errors';
import { Session, expectOk } from '../session/session';
import { pageText } from './resolver';

export interface FilmDetails {
    slug: string;
    name: string;
    year: number | null;
    averageRating: number | null;
}

const JsonLdSchema = z.object({
    name: z.string().optional(),
    releasedEvent: z.array(z.object({ startDate: z.union([z.string(), z.number()]) })).optional(),
    aggregateRating: z.object({ ratingValue: z.union([z.string(), z.number()]) }).optional(),
}).passthrough();

type JsonLd = z.infer<typeof JsonLdSchema>;

/**
 * Public details of a film, read without logging in.
 */
export async function fetchFilmDetails(session: Session, slug: string): Promise<FilmDetails> {
    logger.debug(`Fetching film details: ${slug}`);
    const response = await session.get(paths.filmPage(slug));
    expectOk(response, `fetch film page for '${slug}'`);

    return extractFilmDetails(slug, pageText(response.data));
}

export function extractFilmDetails(slug: string, html: string): FilmDetails {
    const $ = cheerio.load(html);
    const jsonLd = extractJsonLd($);

    return {
        slug,
        name: jsonLd?.name ?? $('.primaryname').first().text().trim(),
        year: extractYear($, jsonLd),
        averageRating: extractRating($, jsonLd),
    };
}

function extractJsonLd($: cheerio.CheerioAPI): JsonLd | null {
    const script = $('script[type="application/ld+json"]').first().html();
    if (!script) return null;

    try {
        // The block is wrapped in /* <![CDATA[ */ comments, which JSON5 skips
        const result = JsonLdSchema.safeParse(JSON5.parse(script));
        return result.success ? result.data : null;
    } catch (e: unknown) {
        logger.debug(`Failed to parse JSON-LD: ${describeError(e)}`);
        return null;
    }
}

function extractYear($: cheerio.CheerioAPI, jsonLd: JsonLd | null): number | null {
    const startDate = jsonLd?.releasedEvent?.[0]?.startDate;
    if (startDate !== undefined) {
        const year = parseInt(String(startDate), 10);
        if (!Number.isNaN(year)) return year;
    }

    const releaseDateLink = $('span.releasedate a').attr('href');
    const yearMatch = releaseDateLink?.match(/\/(\d{4})\//);
    return yearMatch ? parseInt(yearMatch[1], 10) : null;
}

function extractRating($: cheerio.CheerioAPI, jsonLd: JsonLd | null): number | null {
    const ratingValue = jsonLd?.aggregateRating?.ratingValue;
    if (ratingValue !== undefined) {
        const rating = parseFloat(String(ratingValue));
        if (!Number.isNaN(rating)) return rating;
    }

    const metaRating = $('meta[name="twitter:data2"]').attr('content');
    const match = metaRating?.match(/([\d.]+) out of 5/);
    return match ? parseFloat(match[1]) : null;
}
