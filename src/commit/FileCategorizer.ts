import path from 'path';
import { FileCategory } from '../models/ChangeModels';

/**
 * Checked top to bottom, first match wins. Test comes before Config so that
 * `tests/test_config.json` is a test file.
 */
const CATEGORY_PATTERNS: ReadonlyArray<[FileCategory, RegExp[]]> = [
    ['test', [/tests?\//i, /__tests__\//i, /_test\./i, /\.test\./i, /\.spec\./i, /test_/i]],
    ['docs', [/\.md$/i, /\.rst$/i, /\.txt$/i, /^docs?\//i, /README/i, /CHANGELOG/i, /LICENSE/i, /CONTRIBUTING/i]],
    ['config', [
        /\.json$/i, /\.ya?ml$/i, /\.toml$/i, /\.ini$/i, /\.cfg$/i, /\.conf$/i, /\.env/i, /\.gitignore$/i,
        /\.editorconfig$/i, /\.prettierrc/i, /\.eslintrc/i, /tsconfig/i, /jest\.config/i, /webpack\.config/i,
        /babel\.config/i,
    ]],
    ['build', [
        /Dockerfile/i, /docker-compose/i, /Makefile$/i, /\.github\//i, /\.gitlab-ci/i, /\.travis/i, /\.circleci\//i,
        /azure-pipelines/i, /Jenkinsfile/i, /package\.json$/i, /requirements\.txt$/i, /setup\.py$/i,
        /pyproject\.toml$/i, /go\.mod$/i, /Cargo\.toml$/i, /pom\.xml$/i, /build\.gradle/i,
    ]],
    ['style', [/\.css$/i, /\.scss$/i, /\.sass$/i, /\.less$/i, /\.styled\./i]],
];

const SOURCE_EXTENSIONS = new Set([
    '.py', '.js', '.ts', '.jsx', '.tsx', '.java', '.go', '.rs',
    '.c', '.cpp', '.h', '.hpp', '.cs', '.rb', '.php', '.swift',
    '.kt', '.scala', '.clj', '.ex', '.exs', '.erl', '.hs',
]);

export function categorize(filePath: string): FileCategory {
    for (const [category, patterns] of CATEGORY_PATTERNS) {
        if (patterns.some(pattern => pattern.test(filePath))) {
            return category;
        }
    }

    if (SOURCE_EXTENSIONS.has(path.extname(filePath).toLowerCase())) {
        return 'source';
    }

    return 'other';
}
