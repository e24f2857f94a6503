import { sortForDisplay } from '../analyzer/CoverageExport';
import { fallbackCommitForGroup } from '../commit/CommitSuggestion';
import { COMMIT_TYPES } from '../commit/CommitTypes';
import { ChangeMetrics, SplitProposal, StagedChanges } from '../models/ChangeModels';
import { CoverageReportResult } from '../models/CoverageModels';
import { CovCommitError } from '../models/Errors';

const ANSI = {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    dim: '\x1b[2m',
    bold: '\x1b[1m',
    reset: '\x1b[0m',
} as const;

type Color = keyof typeof ANSI;

export function paint(color: Color, text: string): string {
    return `${ANSI[color]}${text}${ANSI.reset}`;
}

/**
 * Print summary plus the first `limit` entries of each list, by file then line
 */
export function printCoverageSummary(result: CoverageReportResult, limit: number): void {
    const { missedBranches, uncoveredLines } = sortForDisplay(result);

    console.log('\n=== JaCoCo Coverage Analysis ===');
    console.log(`Report: ${result.sourceDirectory}`);
    console.log(`Files analyzed: ${result.totalFilesAnalyzed}`);
    console.log(`Missed branches: ${paint('yellow', String(missedBranches.length))}`);
    console.log(`Uncovered lines: ${paint('red', String(uncoveredLines.length))}`);

    if (missedBranches.length > 0) {
        console.log(`\n${paint('yellow', 'Missed branches:')}`);
        missedBranches.slice(0, limit).forEach(branch => {
            console.log(`- ${branch.filePath}:${branch.lineNumber} ${branch.sourceLine}`);
            console.log(`  ${paint('dim', branch.branchInfo)}`);
        });
        if (missedBranches.length > limit) console.log(`  ...and ${missedBranches.length - limit} more`);
    }

    if (uncoveredLines.length > 0) {
        console.log(`\n${paint('red', 'Uncovered lines:')}`);
        uncoveredLines.slice(0, limit).forEach(line => {
            console.log(`- ${line.filePath}:${line.lineNumber} ${line.sourceLine}`);
        });
        if (uncoveredLines.length > limit) console.log(`  ...and ${uncoveredLines.length - limit} more`);
    }
}

export function printStagedChanges(staged: StagedChanges, metrics: ChangeMetrics): void {
    console.log('\n=== Staged Changes ===');
    staged.files.forEach(file => {
        const renamed = file.oldPath ? ` (from ${file.oldPath})` : '';
        const counts = file.isBinary ? 'binary' : `+${file.additions} -${file.deletions}`;
        console.log(`  ${file.status} ${file.filePath}${renamed} ${paint('dim', counts)}`);
    });
    console.log(`Files: ${metrics.totalFiles} (A ${metrics.filesAdded}, M ${metrics.filesModified}, D ${metrics.filesDeleted}, R ${metrics.filesRenamed})`);
    console.log(`Lines changed: ${metrics.totalLinesChanged}`);
    console.log(`Directories: ${metrics.directoriesAffected}`);
    console.log(`Complexity score: ${metrics.complexityScore}`);
}

export function printSplitProposal(proposal: SplitProposal): void {
    if (!proposal.shouldSplit) {
        console.log(`\n${paint('green', 'Single commit recommended.')} ${proposal.rationale}`);
        return;
    }

    console.log(`\n${paint('yellow', `Suggest splitting into ${proposal.totalCommits} commits`)}`);
    console.log(proposal.rationale);

    proposal.groups.forEach((group, index) => {
        const color = COMMIT_TYPES[group.suggestedType].color;
        console.log(`\n${paint('bold', `${index + 1}. ${group.name}`)} ${paint(color, group.suggestedType)} (+${group.totalAdditions} -${group.totalDeletions})`);
        console.log(`   ${group.rationale}`);
        group.files.forEach(file => console.log(`   - ${file.filePath}`));
        console.log(`   Suggested: ${paint('cyan', fallbackCommitForGroup(group).formattedMessage)}`);
    });
}

/**
 * Log-free failure output shared by every command
 */
export function printError(error: unknown): void {
    console.error(`\n${paint('red', 'Error:')} ${error instanceof Error ? error.message : String(error)}`);
    if (error instanceof CovCommitError && error.hint) {
        console.error(`Hint: ${error.hint}`);
    }
}
