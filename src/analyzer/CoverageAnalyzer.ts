import path from 'path';
import { ArchiveExtractor, ArchiveExtractorOptions } from '../archive/ArchiveExtractor';
import { findJacocoIndex } from '../archive/ReportLocator';
import { withScratchDirectory } from '../archive/ScratchDirectory';
import { CoverageReportResult, SourcePage } from '../models/CoverageModels';
import { ReportNotFoundError } from '../models/Errors';
import { expandUserPath, findFiles, toUnixPath } from '../utils/fileUtils';
import logger from '../utils/logger';
import { parseSourceFile } from './JacocoSourceParser';

export type ReportSource = { archivePath: string } | { reportDir: string };

export interface CoverageAnalyzerOptions extends ArchiveExtractorOptions {
    /** Parent directory for archive scratch space; OS temp dir when unset */
    scratchDir?: string;
}

const PAGE_INDEXES = new Set(['index.html', 'index.source.html']);

export class CoverageAnalyzer {
    private readonly extractor: ArchiveExtractor;
    private readonly scratchDir?: string;

    constructor(options: CoverageAnalyzerOptions = {}) {
        this.extractor = new ArchiveExtractor(options);
        this.scratchDir = options.scratchDir;
    }

    /**
     * Analyze a JaCoCo HTML report from an archive or an extracted directory.
     * Archive scratch space is removed before this resolves or rejects.
     */
    async analyzeReport(source: ReportSource): Promise<CoverageReportResult> {
        if ('archivePath' in source) {
            const archivePath = expandUserPath(source.archivePath);
            logger.info(`Analyzing coverage archive ${archivePath}`);

            return await withScratchDirectory(async (scratchDir) => {
                await this.extractor.extract(archivePath, scratchDir);
                return await this.analyzeExtracted(scratchDir);
            }, this.scratchDir);
        }

        const reportDir = expandUserPath(source.reportDir);
        logger.info(`Analyzing coverage report directory ${reportDir}`);
        return await this.analyzeExtracted(reportDir);
    }

    private async analyzeExtracted(baseDir: string): Promise<CoverageReportResult> {
        const indexPath = await findJacocoIndex(baseDir);
        if (!indexPath) {
            throw new ReportNotFoundError(
                `Could not find JaCoCo index.html in ${baseDir}`,
                'Point at the directory containing the JaCoCo HTML report or an archive of it.'
            );
        }

        return await this.analyzeDirectory(path.dirname(indexPath));
    }

    /**
     * Scan every per-class page under a report root, in enumeration order.
     */
    async analyzeDirectory(reportRoot: string): Promise<CoverageReportResult> {
        const pages = await findSourcePages(reportRoot);
        const result: CoverageReportResult = {
            missedBranches: [],
            uncoveredLines: [],
            totalFilesAnalyzed: pages.length,
            sourceDirectory: reportRoot,
        };

        for (const page of pages) {
            const { missedBranches, uncoveredLines } = await parseSourceFile(page.absolutePath, page.className);

            for (const branch of missedBranches) {
                result.missedBranches.push({ ...branch, filePath: page.relativePath });
            }
            for (const line of uncoveredLines) {
                result.uncoveredLines.push({ ...line, filePath: page.relativePath });
            }
        }

        logger.info(
            `Analyzed ${result.totalFilesAnalyzed} pages: ${result.missedBranches.length} missed branches, ` +
            `${result.uncoveredLines.length} uncovered lines`
        );
        return result;
    }
}

/**
 * Per-class pages under `reportRoot`, sorted by relative path. Package and
 * source indexes are skipped.
 */
export async function findSourcePages(reportRoot: string): Promise<SourcePage[]> {
    const files = await findFiles(reportRoot, '**/*.html', { absolute: false });

    return files
        .filter(file => !PAGE_INDEXES.has(path.posix.basename(file)))
        .sort()
        .map(file => ({
            absolutePath: path.join(reportRoot, file),
            relativePath: toUnixPath(path.normalize(file)),
            className: path.posix.basename(file).replace(/\.html$/, ''),
        }));
}
