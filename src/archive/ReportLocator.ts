import { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { fileExists, readHead } from '../utils/fileUtils';
import logger from '../utils/logger';

/** Where JaCoCo's Maven and Gradle plugins put the report, relative to the root */
export const CONVENTIONAL_INDEX_PATHS = [
    'index.html',
    'jacoco/index.html',
    'site/jacoco/index.html',
    'target/site/jacoco/index.html',
    'build/reports/jacoco/test/html/index.html',
];

const SNIFF_LENGTH = 1000;
const REPORT_MARKERS = ['jacoco', 'coverage'];

/**
 * Locate the JaCoCo `index.html` under `directory`, or null.
 */
export async function findJacocoIndex(directory: string): Promise<string | null> {
    for (const candidate of CONVENTIONAL_INDEX_PATHS) {
        const indexPath = path.join(directory, candidate);
        if (await fileExists(indexPath)) {
            return indexPath;
        }
    }

    return await searchIndex(directory);
}

/**
 * Depth-first: a directory's own index.html is checked before its
 * subdirectories, which are visited in name order.
 */
async function searchIndex(directory: string): Promise<string | null> {
    let entries: Dirent[];
    try {
        entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
        logger.warn(`Cannot read directory ${directory}: ${error}`);
        return null;
    }

    const hasIndex = entries.some(entry => entry.isFile() && entry.name === 'index.html');
    if (hasIndex) {
        const indexPath = path.join(directory, 'index.html');
        if (await looksLikeCoverageReport(indexPath)) {
            return indexPath;
        }
    }

    const subdirectories = entries
        .filter(entry => entry.isDirectory())
        .map(entry => entry.name)
        .sort();

    for (const name of subdirectories) {
        const found = await searchIndex(path.join(directory, name));
        if (found) {
            return found;
        }
    }

    return null;
}

async function looksLikeCoverageReport(indexPath: string): Promise<boolean> {
    try {
        const head = (await readHead(indexPath, SNIFF_LENGTH)).toLowerCase();
        return REPORT_MARKERS.some(marker => head.includes(marker));
    } catch (error) {
        logger.warn(`Cannot read ${indexPath}: ${error}`);
        return false;
    }
}
