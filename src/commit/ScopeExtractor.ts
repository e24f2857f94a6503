/**
 * Path-prefix rules checked in order; the first match names the scope.
 */
const SCOPE_RULES: ReadonlyArray<[RegExp, string]> = [
    [/^src\/components\//, 'components'],
    [/^src\/api\//, 'api'],
    [/^src\/services\//, 'services'],
    [/^src\/utils\//, 'utils'],
    [/^src\/hooks\//, 'hooks'],
    [/^src\/store\//, 'store'],
    [/^src\/models\//, 'models'],
    [/^src\/views\//, 'views'],
    [/^src\/pages\//, 'pages'],
    [/^src\/lib\//, 'lib'],
    [/^tests?\//, 'tests'],
    [/^docs?\//, 'docs'],
    [/^config\//, 'config'],
    [/^scripts\//, 'scripts'],
    [/^\.github\//, 'ci'],
    [/^\./, 'config'],
];

const CONTAINER_DIRS = new Set(['src', 'lib', 'pkg']);

export function scopeFromPath(filePath: string): string | null {
    for (const [pattern, scope] of SCOPE_RULES) {
        if (pattern.test(filePath)) {
            return scope;
        }
    }

    const parts = filePath.split('/');
    if (parts.length > 1) {
        const firstDir = parts[0].toLowerCase();
        if (CONTAINER_DIRS.has(firstDir)) {
            if (parts.length > 2) {
                return parts[1].toLowerCase();
            }
        } else if (firstDir !== '.' && firstDir !== '..') {
            return firstDir;
        }
    }

    return null;
}

/**
 * Scope shared by a set of paths: the most frequent per-file scope, kept
 * only when it covers at least half of all the paths.
 */
export function extractScope(filePaths: string[]): string | null {
    if (filePaths.length === 0) {
        return null;
    }

    if (filePaths.length === 1) {
        return scopeFromPath(filePaths[0]);
    }

    const counts = new Map<string, number>();
    for (const filePath of filePaths) {
        const scope = scopeFromPath(filePath);
        if (scope) {
            counts.set(scope, (counts.get(scope) ?? 0) + 1);
        }
    }

    let best: string | null = null;
    let bestCount = 0;
    for (const [scope, count] of counts) {
        if (count > bestCount) {
            best = scope;
            bestCount = count;
        }
    }

    if (best !== null && bestCount >= filePaths.length / 2) {
        return best;
    }

    return null;
}
