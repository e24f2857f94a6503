import { ChangeMetrics, FileCategory, FileChange, SplitGroup, SplitProposal, StagedChanges } from '../models/ChangeModels';
import { categorize } from './FileCategorizer';
import { detectComponents } from './ComponentDetector';
import { detectCommitType } from './CommitTypeDetector';
import logger from '../utils/logger';

export interface CommitSplitterOptions {
    /** Total changed lines above which a split is suggested */
    maxCommitSize?: number;
    complexityThreshold?: number;
}

export const DEFAULT_MAX_COMMIT_SIZE = 200;
export const DEFAULT_COMPLEXITY_THRESHOLD = 50;

/** Source categories with more files than this are split per component */
const COMPONENT_SPLIT_THRESHOLD = 5;

const UNRELATED_CATEGORIES: ReadonlySet<FileCategory> = new Set<FileCategory>(['source', 'test', 'docs']);

/** Commit order: build and config first, docs last */
const CATEGORY_PRIORITY: Record<FileCategory, number> = {
    build: 0,
    config: 1,
    source: 2,
    style: 3,
    test: 4,
    docs: 5,
    other: 6,
};

const CATEGORY_RATIONALE: Partial<Record<FileCategory, string>> = {
    test: 'Test files should be committed separately to clearly identify test changes.',
    docs: 'Documentation changes should be in their own commit for clear history.',
    config: 'Configuration changes may need separate review and rollback capability.',
    build: 'Build/CI changes should be isolated for easier debugging of build issues.',
};

export class CommitSplitter {
    private readonly maxCommitSize: number;
    private readonly complexityThreshold: number;

    constructor(options: CommitSplitterOptions = {}) {
        this.maxCommitSize = options.maxCommitSize ?? DEFAULT_MAX_COMMIT_SIZE;
        this.complexityThreshold = options.complexityThreshold ?? DEFAULT_COMPLEXITY_THRESHOLD;
    }

    /**
     * Decide whether the staged changes should become several commits and,
     * if so, in which groups and order.
     */
    analyze(staged: StagedChanges, metrics: ChangeMetrics): SplitProposal {
        if (!this.shouldSplit(staged, metrics)) {
            return createProposal(false, [], 'Changes are small enough for a single commit.', metrics);
        }

        const groups = this.generateGroups(staged.files).filter(group => group.fileCount > 0);

        if (groups.length <= 1) {
            logger.info('Split triggered but all changes form a single group; keeping one commit');
            return createProposal(false, [], 'All changes belong to a single logical group.', metrics);
        }

        logger.info(`Suggesting ${groups.length} commits for ${staged.files.length} staged files`);
        return createProposal(true, groups, this.generateRationale(metrics, groups), metrics);
    }

    shouldSplit(staged: StagedChanges, metrics: ChangeMetrics): boolean {
        if (staged.totalAdditions + staged.totalDeletions > this.maxCommitSize) {
            return true;
        }

        if (metrics.complexityScore > this.complexityThreshold) {
            return true;
        }

        const categories = new Set(staged.files.map(file => categorize(file.filePath)));
        const unrelated = [...categories].filter(category => UNRELATED_CATEGORIES.has(category));

        return unrelated.length >= 2;
    }

    private generateGroups(files: FileChange[]): SplitGroup[] {
        const byCategory = new Map<FileCategory, FileChange[]>();
        for (const file of files) {
            const category = categorize(file.filePath);
            const members = byCategory.get(category);
            if (members) {
                members.push(file);
            } else {
                byCategory.set(category, [file]);
            }
        }

        const groups: SplitGroup[] = [];
        for (const [category, members] of byCategory) {
            if (category === 'source' && members.length > COMPONENT_SPLIT_THRESHOLD) {
                groups.push(...this.splitByComponent(members, category));
            } else {
                groups.push(createGroup(members, category));
            }
        }

        // Array.prototype.sort is stable, so groups of one category keep their order
        return groups.sort((a, b) => CATEGORY_PRIORITY[a.category] - CATEGORY_PRIORITY[b.category]);
    }

    private splitByComponent(files: FileChange[], category: FileCategory): SplitGroup[] {
        const byPath = new Map(files.map(file => [file.filePath, file] as const));
        const components = detectComponents(files.map(file => file.filePath));

        const groups: SplitGroup[] = [];
        for (const [component, paths] of components) {
            const members = paths.flatMap(p => {
                const file = byPath.get(p);
                return file ? [file] : [];
            });
            groups.push(createGroup(members, category, component));
        }
        return groups;
    }

    private generateRationale(metrics: ChangeMetrics, groups: SplitGroup[]): string {
        const reasons: string[] = [];

        if (metrics.totalLinesChanged > this.maxCommitSize) {
            reasons.push(
                `Total changes (${metrics.totalLinesChanged} lines) exceed recommended maximum (${this.maxCommitSize} lines)`
            );
        }

        if (metrics.complexityScore > this.complexityThreshold) {
            reasons.push(`Complexity score (${metrics.complexityScore}) exceeds threshold (${this.complexityThreshold})`);
        }

        if (groups.length > 2) {
            const categories = [...new Set(groups.map(group => group.category))];
            reasons.push(`Changes span multiple categories: ${categories.join(', ')}`);
        }

        if (metrics.directoriesAffected > 5) {
            reasons.push(`Changes affect ${metrics.directoriesAffected} directories`);
        }

        return ['Suggested split because:', ...reasons.map(reason => `  - ${reason}`)].join('\n');
    }
}

function titleCase(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}

export function createGroup(files: FileChange[], category: FileCategory, componentName?: string): SplitGroup {
    const totalAdditions = files.reduce((sum, file) => sum + file.additions, 0);
    const totalDeletions = files.reduce((sum, file) => sum + file.deletions, 0);

    return {
        name: componentName ? `${category}: ${componentName}` : category,
        description: componentName ? `Changes to ${componentName} (${category})` : `${titleCase(category)} changes`,
        files,
        category,
        suggestedType: detectCommitType(files.map(file => file.filePath)),
        totalAdditions,
        totalDeletions,
        rationale: CATEGORY_RATIONALE[category] ?? `Group of related ${category} changes.`,
        totalLines: totalAdditions + totalDeletions,
        fileCount: files.length,
    };
}

function createProposal(
    shouldSplit: boolean,
    groups: SplitGroup[],
    rationale: string,
    originalMetrics: ChangeMetrics
): SplitProposal {
    return {
        shouldSplit,
        groups,
        rationale,
        originalMetrics,
        totalCommits: shouldSplit ? groups.length : 1,
    };
}

/**
 * Analyze in one call with the given thresholds.
 */
export function suggestCommitSplit(
    staged: StagedChanges,
    metrics: ChangeMetrics,
    options: CommitSplitterOptions = {}
): SplitProposal {
    return new CommitSplitter(options).analyze(staged, metrics);
}

const STATUS_LABELS: Record<FileChange['status'], string> = {
    A: 'added',
    M: 'modified',
    D: 'deleted',
    R: 'renamed',
};

/**
 * Plain-text summary of one group, handed to whatever writes the message.
 */
export function buildGroupSummary(group: SplitGroup): string {
    const lines = [
        `Category: ${group.category}`,
        `Description: ${group.description}`,
        `Total lines: +${group.totalAdditions} -${group.totalDeletions}`,
        '',
        'Files:',
        ...group.files.map(
            file => `  - ${file.filePath} (${STATUS_LABELS[file.status]}, +${file.additions} -${file.deletions})`
        ),
    ];
    return lines.join('\n') + '\n';
}
