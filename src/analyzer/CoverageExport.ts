import {
    CoverageExport,
    CoverageReportResult,
    FileCoverageExport,
    MissedBranch,
    UncoveredLine,
} from '../models/CoverageModels';

/**
 * Serialize a result into the export structure. Entry order follows the
 * result's own order.
 */
export function formatAnalysisResult(result: CoverageReportResult): CoverageExport {
    return {
        summary: {
            total_files_analyzed: result.totalFilesAnalyzed,
            total_missed_branches: result.missedBranches.length,
            total_uncovered_lines: result.uncoveredLines.length,
        },
        missed_branches: result.missedBranches.map(branch => ({
            file: branch.filePath,
            class: branch.className,
            line: branch.lineNumber,
            branch_info: branch.branchInfo,
            source: branch.sourceLine,
        })),
        uncovered_lines: result.uncoveredLines.map(line => ({
            file: line.filePath,
            class: line.className,
            line: line.lineNumber,
            source: line.sourceLine,
        })),
        by_file: groupByFile(result),
    };
}

function groupByFile(result: CoverageReportResult): Record<string, FileCoverageExport> {
    const byFile: Record<string, FileCoverageExport> = {};
    const entryFor = (filePath: string): FileCoverageExport => {
        if (!byFile[filePath]) {
            byFile[filePath] = { missed_branches: [], uncovered_lines: [] };
        }
        return byFile[filePath];
    };

    for (const branch of result.missedBranches) {
        entryFor(branch.filePath).missed_branches.push({
            line: branch.lineNumber,
            branch_info: branch.branchInfo,
            source: branch.sourceLine,
        });
    }

    for (const line of result.uncoveredLines) {
        entryFor(line.filePath).uncovered_lines.push({
            line: line.lineNumber,
            source: line.sourceLine,
        });
    }

    return byFile;
}

function byFileThenLine(a: { filePath: string; lineNumber: number }, b: { filePath: string; lineNumber: number }): number {
    if (a.filePath !== b.filePath) {
        return a.filePath < b.filePath ? -1 : 1;
    }
    return a.lineNumber - b.lineNumber;
}

/**
 * Copies of both lists ordered by file, then line, for display.
 */
export function sortForDisplay(result: CoverageReportResult): {
    missedBranches: MissedBranch[];
    uncoveredLines: UncoveredLine[];
} {
    return {
        missedBranches: [...result.missedBranches].sort(byFileThenLine),
        uncoveredLines: [...result.uncoveredLines].sort(byFileThenLine),
    };
}
