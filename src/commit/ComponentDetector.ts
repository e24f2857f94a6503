import path from 'path';

/** Conventional roots that never name a component themselves */
const SKIP_DIRS = new Set(['src', 'lib', 'pkg', 'app', 'internal', 'cmd']);

export function extractComponent(filePath: string): string {
    const parts = filePath.split(/[\\/]/);

    for (let i = 0; i < parts.length; i++) {
        const part = parts[i];
        if (SKIP_DIRS.has(part.toLowerCase())) {
            if (i + 1 < parts.length - 1) {
                return parts[i + 1];
            }
        } else if (part !== '.' && part !== '..' && i < parts.length - 1) {
            return part;
        }
    }

    const fileName = parts[parts.length - 1];
    return path.parse(fileName).name || 'root';
}

/**
 * Group paths by component, keeping first-seen order.
 */
export function detectComponents(filePaths: string[]): Map<string, string[]> {
    const components = new Map<string, string[]>();

    for (const filePath of filePaths) {
        const component = extractComponent(filePath);
        const members = components.get(component);
        if (members) {
            members.push(filePath);
        } else {
            components.set(component, [filePath]);
        }
    }

    return components;
}
