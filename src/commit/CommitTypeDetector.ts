import { CommitType } from './CommitTypes';

/**
 * Checked in this order; on equal match counts the earlier type wins.
 */
const TYPE_PATTERNS: ReadonlyArray<[CommitType, RegExp[]]> = [
    ['docs', [/\.md$/i, /\.rst$/i, /\.txt$/i, /^docs?\//i, /README/i, /LICENSE/i, /CHANGELOG/i]],
    ['test', [/test[s_]?\//i, /_test\./i, /\.test\./i, /\.spec\./i, /__tests__\//i]],
    ['ci', [/\.github\//i, /\.gitlab-ci/i, /Jenkinsfile/i, /\.travis/i, /\.circleci\//i, /azure-pipelines/i]],
    ['build', [
        /package\.json$/i, /package-lock\.json$/i, /yarn\.lock$/i, /requirements\.txt$/i, /setup\.py$/i,
        /pyproject\.toml$/i, /Makefile$/i, /Dockerfile/i, /docker-compose/i, /\.gradle/i, /pom\.xml$/i,
    ]],
    ['style', [/\.css$/i, /\.scss$/i, /\.less$/i, /\.styled\./i]],
    ['chore', [/\.gitignore$/i, /\.editorconfig$/i, /\.prettierrc/i, /\.eslintrc/i, /tsconfig\.json$/i]],
];

const KEYWORD_HINTS: ReadonlyArray<[CommitType, string[]]> = [
    ['fix', ['fix', 'bug', 'issue', 'error', 'crash']],
    ['feat', ['add', 'new', 'feature', 'implement']],
    ['refactor', ['refactor', 'rename', 'move', 'restructure']],
    ['perf', ['performance', 'optimize', 'speed', 'cache']],
];

function matchesAnyType(filePath: string): boolean {
    return TYPE_PATTERNS.some(([, patterns]) => patterns.some(pattern => pattern.test(filePath)));
}

/**
 * Pick a commit type for a set of paths, falling back to keywords in the
 * diff text, then to feat/refactor by how many files look new.
 */
export function detectCommitType(filePaths: string[], diffContent?: string): CommitType {
    if (filePaths.length === 0) {
        return 'chore';
    }

    let best: CommitType | null = null;
    let bestCount = 0;
    for (const [type, patterns] of TYPE_PATTERNS) {
        const count = filePaths.filter(filePath => patterns.some(pattern => pattern.test(filePath))).length;
        if (count > bestCount) {
            best = type;
            bestCount = count;
        }
    }

    if (best) {
        return best;
    }

    if (diffContent) {
        const content = diffContent.toLowerCase();
        for (const [type, keywords] of KEYWORD_HINTS) {
            if (keywords.some(keyword => content.includes(keyword))) {
                return type;
            }
        }
    }

    const newFiles = filePaths.filter(filePath => filePath.toLowerCase().includes('new') || !matchesAnyType(filePath)).length;

    return newFiles > filePaths.length / 2 ? 'feat' : 'refactor';
}
