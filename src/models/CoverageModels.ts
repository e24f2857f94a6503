/**
 * A line JaCoCo marked as partially covered (`pc`): some branches never ran.
 */
export interface MissedBranch {
    filePath: string;
    className: string;
    lineNumber: number;
    /** JaCoCo's tooltip, e.g. "1 of 2 branches missed." */
    branchInfo: string;
    sourceLine: string;
}

/**
 * A line JaCoCo marked as not covered (`nc`).
 */
export interface UncoveredLine {
    filePath: string;
    className: string;
    lineNumber: number;
    sourceLine: string;
}

export interface PageCoverage {
    missedBranches: MissedBranch[];
    uncoveredLines: UncoveredLine[];
}

/**
 * Report-level result. Entries follow page enumeration order, not line order
 * across files; sort before displaying.
 */
export interface CoverageReportResult extends PageCoverage {
    totalFilesAnalyzed: number;
    sourceDirectory: string;
}

export interface SourcePage {
    absolutePath: string;
    relativePath: string;
    className: string;
}

/**
 * Serialized shape consumed by exporters and prompt builders.
 * Field names are part of the contract.
 */
export interface CoverageExport {
    summary: {
        total_files_analyzed: number;
        total_missed_branches: number;
        total_uncovered_lines: number;
    };
    missed_branches: Array<{
        file: string;
        class: string;
        line: number;
        branch_info: string;
        source: string;
    }>;
    uncovered_lines: Array<{
        file: string;
        class: string;
        line: number;
        source: string;
    }>;
    by_file: Record<string, FileCoverageExport>;
}

export interface FileCoverageExport {
    missed_branches: Array<{ line: number; branch_info: string; source: string }>;
    uncovered_lines: Array<{ line: number; source: string }>;
}
