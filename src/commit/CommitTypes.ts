export const ALL_COMMIT_TYPES = [
    'feat', 'fix', 'docs', 'style', 'refactor', 'test', 'chore', 'perf', 'ci', 'build', 'revert',
] as const;

export type CommitType = typeof ALL_COMMIT_TYPES[number];

export interface CommitTypeInfo {
    description: string;
    /** Terminal color used when listing types */
    color: 'green' | 'red' | 'blue' | 'magenta' | 'yellow' | 'cyan' | 'dim';
}

export const COMMIT_TYPES: Readonly<Record<CommitType, CommitTypeInfo>> = {
    feat: { description: 'A new feature', color: 'green' },
    fix: { description: 'A bug fix', color: 'red' },
    docs: { description: 'Documentation only changes', color: 'blue' },
    style: { description: 'Changes that do not affect the meaning of the code', color: 'magenta' },
    refactor: { description: 'A code change that neither fixes a bug nor adds a feature', color: 'yellow' },
    test: { description: 'Adding missing tests or correcting existing tests', color: 'cyan' },
    chore: { description: "Other changes that don't modify src or test files", color: 'dim' },
    perf: { description: 'A code change that improves performance', color: 'green' },
    ci: { description: 'Changes to CI configuration files and scripts', color: 'blue' },
    build: { description: 'Changes that affect the build system or external dependencies', color: 'yellow' },
    revert: { description: 'Reverts a previous commit', color: 'red' },
};

export function isCommitType(value: string): value is CommitType {
    return ALL_COMMIT_TYPES.some(type => type === value);
}

/**
 * Case-insensitive lookup; unknown keywords yield null.
 */
export function parseCommitType(value: string): CommitType | null {
    const normalized = value.toLowerCase();
    return isCommitType(normalized) ? normalized : null;
}

export function describeCommitType(type: CommitType): string {
    return COMMIT_TYPES[type].description;
}
