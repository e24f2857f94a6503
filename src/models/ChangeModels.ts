import { CommitType } from '../commit/CommitTypes';

export type FileStatus = 'A' | 'M' | 'D' | 'R';

export interface FileChange {
    filePath: string;
    status: FileStatus;
    additions: number;
    deletions: number;
    isBinary: boolean;
    /** Set only for renames */
    oldPath?: string;
}

export interface StagedChanges {
    files: FileChange[];
    totalAdditions: number;
    totalDeletions: number;
    totalFiles: number;
    diffContent: string;
}

export interface ChangeMetrics {
    totalLinesChanged: number;
    totalFiles: number;
    filesAdded: number;
    filesModified: number;
    filesDeleted: number;
    filesRenamed: number;
    directoriesAffected: number;
    /** extension (lowercase, with dot) or `no_extension` → count */
    fileTypes: Record<string, number>;
    complexityScore: number;
}

export const FILE_CATEGORIES = ['source', 'test', 'docs', 'config', 'build', 'style', 'other'] as const;

export type FileCategory = typeof FILE_CATEGORIES[number];

export interface SplitGroup {
    name: string;
    description: string;
    files: FileChange[];
    category: FileCategory;
    suggestedType: CommitType;
    totalAdditions: number;
    totalDeletions: number;
    rationale: string;
    readonly totalLines: number;
    readonly fileCount: number;
}

export interface SplitProposal {
    shouldSplit: boolean;
    groups: SplitGroup[];
    rationale: string;
    originalMetrics: ChangeMetrics;
    readonly totalCommits: number;
}

export interface CommitResult {
    success: boolean;
    sha: string | null;
    message: string;
    error?: string;
}
