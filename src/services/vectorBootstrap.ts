import AdmZip from 'adm-zip';
import axios from 'axios';
import { createWriteStream } from 'fs';
import { access, mkdir, rename, rm } from 'fs/promises';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { AppConfig, archiveFilePath, vectorFilePath } from '../config/appConfig.js';
import { logger } from '../utils/logger.js';

export type BootstrapResult =
    | { ok: true; downloaded: boolean; extracted: boolean }
    | { ok: false; message: string };

type BootstrapConfig = Pick<AppConfig, 'vectorDir' | 'vectorFile' | 'archiveFile' | 'archiveUrl'>;

async function exists(filePath: string): Promise<boolean> {
    try {
        await access(filePath);
        return true;
    } catch {
        return false;
    }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// Streams into a .part file first so an interrupted download is never taken for a complete archive
async function downloadArchive(url: string, archivePath: string): Promise<void> {
    const partialPath = `${archivePath}.part`;
    logger.info(`Downloading word vectors from ${url}...`);
    const response = await axios.get<Readable>(url, { responseType: 'stream' });
    try {
        await pipeline(response.data, createWriteStream(partialPath));
    } catch (error) {
        await rm(partialPath, { force: true });
        throw error;
    }
    await rename(partialPath, archivePath);
    logger.info('Download complete');
}

function extractVectorFile(archivePath: string, vectorDir: string, entryName: string): BootstrapResult {
    logger.info(`Extracting ${entryName} from ${archivePath}...`);
    const zip = new AdmZip(archivePath);
    const entry = zip.getEntry(entryName);
    if (!entry) {
        const available = zip.getEntries().map((e) => e.entryName);
        return {
            ok: false,
            message: `${entryName} not found in the zip archive. Available files: ${available.join(', ')}`
        };
    }
    if (!zip.extractEntryTo(entry, vectorDir, false, true)) {
        return { ok: false, message: `Failed to extract ${entryName} from ${archivePath}` };
    }
    logger.info('Extraction complete');
    return { ok: true, downloaded: false, extracted: true };
}

/**
 * Make sure the vector file is on disk, downloading and unpacking the
 * archive when needed. An archive already present is reused.
 */
export async function ensureVectorFile(config: BootstrapConfig): Promise<BootstrapResult> {
    const vectorPath = vectorFilePath(config);
    if (await exists(vectorPath)) {
        logger.info(`${vectorPath} already exists. Skipping download.`);
        return { ok: true, downloaded: false, extracted: false };
    }

    await mkdir(config.vectorDir, { recursive: true });

    const archivePath = archiveFilePath(config);
    let downloaded = false;
    if (await exists(archivePath)) {
        logger.info(`${archivePath} already exists. Skipping download.`);
    } else {
        try {
            await downloadArchive(config.archiveUrl, archivePath);
            downloaded = true;
        } catch (error) {
            return { ok: false, message: `Error downloading word vectors: ${errorMessage(error)}` };
        }
    }

    try {
        const result = extractVectorFile(archivePath, config.vectorDir, path.basename(config.vectorFile));
        return result.ok ? { ...result, downloaded } : result;
    } catch (error) {
        return { ok: false, message: `Error extracting zip file: ${errorMessage(error)}` };
    }
}
