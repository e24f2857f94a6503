import path from 'path';
import AdmZip from 'adm-zip';
import { CommandResult, CommandRunner } from '../executor/CommandRunner';
import {
    ExtractionUnavailableError,
    InvalidArchiveError,
    UnsupportedArchiveError,
} from '../models/Errors';
import logger from '../utils/logger';

/**
 * In-process 7z decoder. None ships with this package and the CLI never
 * sets one; callers of the library API can plug one in, otherwise the
 * external executable is used.
 */
export interface SevenZipDecoder {
    extractAll(archivePath: string, destination: string): Promise<void>;
}

export interface ArchiveExtractorOptions {
    /** 7z-compatible executable; `7z` on PATH when unset */
    sevenZipPath?: string;
    sevenZipDecoder?: SevenZipDecoder;
    runner?: CommandRunner;
}

export type ArchiveKind = 'zip' | '7z';

export function archiveKind(archivePath: string): ArchiveKind | null {
    const lower = archivePath.toLowerCase();
    if (lower.endsWith('.zip')) {
        return 'zip';
    }
    if (lower.endsWith('.7z') || lower.endsWith('.7zip')) {
        return '7z';
    }
    return null;
}

function isMissingExecutable(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class ArchiveExtractor {
    private readonly sevenZipPath: string;
    private readonly sevenZipDecoder?: SevenZipDecoder;
    private readonly runner: CommandRunner;

    constructor(options: ArchiveExtractorOptions = {}) {
        this.sevenZipPath = options.sevenZipPath || '7z';
        this.sevenZipDecoder = options.sevenZipDecoder;
        this.runner = options.runner ?? new CommandRunner();
    }

    /**
     * Extract a zip or 7z archive into `destination`, which must exist.
     */
    async extract(archivePath: string, destination: string): Promise<void> {
        const absolutePath = path.resolve(archivePath);

        switch (archiveKind(absolutePath)) {
            case 'zip':
                this.extractZip(absolutePath, destination);
                break;
            case '7z':
                await this.extractSevenZip(absolutePath, destination);
                break;
            default:
                throw new UnsupportedArchiveError(
                    `Unsupported archive format: ${absolutePath}`,
                    'Provide a .zip or .7z archive, or the extracted report directory.'
                );
        }

        logger.info(`Extracted ${path.basename(absolutePath)} to ${destination}`);
    }

    private extractZip(archivePath: string, destination: string): void {
        try {
            const zip = new AdmZip(archivePath);
            zip.extractAllTo(destination, true);
        } catch (error) {
            throw new InvalidArchiveError(
                `Invalid or corrupted zip file: ${archivePath} (${error instanceof Error ? error.message : String(error)})`
            );
        }
    }

    private async extractSevenZip(archivePath: string, destination: string): Promise<void> {
        if (this.sevenZipDecoder) {
            await this.sevenZipDecoder.extractAll(archivePath, destination);
            return;
        }

        let result: CommandResult;
        try {
            result = await this.runner.execute(this.sevenZipPath, ['x', archivePath, `-o${destination}`, '-y']);
        } catch (error) {
            if (isMissingExecutable(error)) {
                throw new ExtractionUnavailableError(
                    `Cannot extract 7z file: no 7-Zip executable found at "${this.sevenZipPath}"`,
                    'Install the 7-Zip command line tool, or set SEVEN_ZIP_PATH / --seven-zip to its executable.'
                );
            }
            throw error;
        }

        if (result.exitCode !== 0) {
            throw new InvalidArchiveError(
                `7-Zip failed to extract ${archivePath} (exit code ${result.exitCode}): ${result.stderr.trim()}`
            );
        }
    }
}
