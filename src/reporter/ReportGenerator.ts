import path from 'path';
import { formatAnalysisResult } from '../analyzer/CoverageExport';
import { CoverageReportResult } from '../models/CoverageModels';
import { SplitProposal } from '../models/ChangeModels';
import { writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';

/**
 * JSON view of a split proposal: files reduced to path, status and deltas.
 */
export function serializeProposal(proposal: SplitProposal) {
    return {
        should_split: proposal.shouldSplit,
        total_commits: proposal.totalCommits,
        rationale: proposal.rationale,
        metrics: proposal.originalMetrics,
        groups: proposal.groups.map(group => ({
            name: group.name,
            description: group.description,
            category: group.category,
            suggested_type: group.suggestedType,
            total_additions: group.totalAdditions,
            total_deletions: group.totalDeletions,
            rationale: group.rationale,
            files: group.files.map(file => ({
                path: file.filePath,
                status: file.status,
                additions: file.additions,
                deletions: file.deletions,
            })),
        })),
    };
}

/**
 * Writes analysis results to disk
 */
export class ReportGenerator {
    /**
     * Write the coverage export as pretty-printed JSON
     */
    async writeCoverageReport(result: CoverageReportResult, outputPath: string): Promise<string> {
        const jsonPath = path.resolve(outputPath);
        await writeFile(jsonPath, JSON.stringify(formatAnalysisResult(result), null, 2));
        logger.info(`Coverage report written: ${jsonPath}`);
        return jsonPath;
    }

    /**
     * Write a split proposal under `outputDir` as split-proposal.json
     */
    async writeSplitProposal(proposal: SplitProposal, outputDir: string): Promise<string> {
        const jsonPath = path.resolve(outputDir, 'split-proposal.json');
        await writeFile(jsonPath, JSON.stringify(serializeProposal(proposal), null, 2));
        logger.info(`Split proposal written: ${jsonPath}`);
        return jsonPath;
    }
}
