import fs from 'fs/promises';
import path from 'path';
import { ZipReader, Uint8ArrayReader, Uint8ArrayWriter, configure } from '@zip.js/zip.js';
import logger from '../util/logger';
import { paths } from '../util/constants';
import { ConnectionError, describeError } from '../util/errors';
import { Session, HttpResponse, headerValue } from '../session/session';

// Node has no web workers to hand the inflate work to
configure({ useWebWorkers: false });

function archiveBytes(response: HttpResponse): Uint8Array {
    const { data } = response;
    if (ArrayBuffer.isView(data)) return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    if (data instanceof ArrayBuffer) return new Uint8Array(data);
    throw new ConnectionError('Export response body is not binary data.');
}

export function filenameFromDisposition(disposition: string | undefined): string | undefined {
    if (!disposition || !disposition.includes('filename=')) return undefined;
    const raw = disposition.split('filename=').pop()?.trim().replace(/^"|[";]+$/g, '');
    // Never let the header pick a directory
    return raw ? path.basename(raw) : undefined;
}

/**
 * Downloads the account export (a zip of CSVs) and unpacks it.
 */
export class DataExportRetriever {
    constructor(private readonly session: Session) { }

    /**
     * @returns the directory the archive was extracted into
     */
    async downloadAndExtract(destinationDir: string): Promise<string> {
        this.session.requireAuthenticated('download the data export');

        const response = await this.session.get(paths.dataExport, 'arraybuffer');
        if (response.status !== 200) {
            throw new ConnectionError(`Failed to download export data: HTTP ${response.status}`);
        }

        const contentType = headerValue(response, 'content-type') ?? '';
        if (!contentType.includes('application/zip')) {
            logger.error(`Unexpected content type: ${contentType}`);
            throw new ConnectionError('Received invalid response. Expected a ZIP file.');
        }

        const filename = filenameFromDisposition(headerValue(response, 'content-disposition'));
        if (!filename) {
            throw new ConnectionError('Could not determine the filename from the response headers.');
        }
        logger.info(`Downloaded file identified as '${filename}'.`);

        await fs.mkdir(destinationDir, { recursive: true });
        const archivePath = path.join(destinationDir, filename);
        const bytes = archiveBytes(response);
        await fs.writeFile(archivePath, bytes);
        logger.info(`Export data saved to '${archivePath}'.`);

        const extractedDir = path.join(destinationDir, path.parse(filename).name);
        try {
            await extractArchive(bytes, extractedDir);
            logger.info(`Export data extracted to '${extractedDir}'.`);
        } catch (e: unknown) {
            await fs.rm(extractedDir, { recursive: true, force: true });
            throw e;
        } finally {
            await removeArchive(archivePath);
        }

        return extractedDir;
    }
}

async function removeArchive(archivePath: string): Promise<void> {
    try {
        await fs.rm(archivePath, { force: true });
        logger.info(`Temporary archive file '${archivePath}' deleted.`);
    } catch (e: unknown) {
        logger.warn(`Failed to delete temporary archive file: ${describeError(e)}`);
    }
}

async function extractArchive(bytes: Uint8Array, targetDir: string): Promise<void> {
    const reader = new ZipReader(new Uint8ArrayReader(bytes));
    const root = path.resolve(targetDir);

    try {
        const entries = await reader.getEntries();
        for (const entry of entries) {
            const target = path.resolve(root, entry.filename);
            if (target !== root && !target.startsWith(root + path.sep)) {
                throw new ConnectionError(`Archive entry '${entry.filename}' escapes the export directory.`);
            }

            if (entry.directory) {
                await fs.mkdir(target, { recursive: true });
                continue;
            }

            const content = await entry.getData?.(new Uint8ArrayWriter());
            if (!content) continue;
            await fs.mkdir(path.dirname(target), { recursive: true });
            await fs.writeFile(target, content);
        }
    } catch (e: unknown) {
        if (e instanceof ConnectionError) throw e;
        // zip.js raises plain errors for unsafe names and corrupt data
        throw new ConnectionError(`Failed to extract export archive: ${describeError(e)}`, { cause: e });
    } finally {
        await reader.close();
    }
}
