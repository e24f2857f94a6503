import path from 'path';
import { ChangeMetrics, StagedChanges } from '../models/ChangeModels';

/**
 * Additive score over four independent scales. The breakpoints are fixed;
 * each scale contributes the value of the highest threshold it exceeds.
 */
export function calculateComplexityScore(lines: number, files: number, dirs: number, types: number): number {
    let score = 0;

    if (lines > 500) score += 50;
    else if (lines > 200) score += 30;
    else if (lines > 100) score += 15;
    else if (lines > 50) score += 5;

    if (files > 20) score += 30;
    else if (files > 10) score += 20;
    else if (files > 5) score += 10;
    else if (files > 2) score += 5;

    if (dirs > 10) score += 20;
    else if (dirs > 5) score += 10;
    else if (dirs > 2) score += 5;

    if (types > 5) score += 15;
    else if (types > 3) score += 10;
    else if (types > 1) score += 5;

    return score;
}

export function emptyMetrics(): ChangeMetrics {
    return {
        totalLinesChanged: 0,
        totalFiles: 0,
        filesAdded: 0,
        filesModified: 0,
        filesDeleted: 0,
        filesRenamed: 0,
        directoriesAffected: 0,
        fileTypes: {},
        complexityScore: 0,
    };
}

export function buildChangeMetrics(staged: StagedChanges): ChangeMetrics {
    if (staged.files.length === 0) {
        return emptyMetrics();
    }

    const directories = new Set<string>();
    const fileTypes: Record<string, number> = {};

    for (const file of staged.files) {
        const dir = path.posix.dirname(file.filePath);
        if (dir !== '.') {
            directories.add(dir);
        }

        const ext = path.posix.extname(file.filePath).toLowerCase() || 'no_extension';
        fileTypes[ext] = (fileTypes[ext] ?? 0) + 1;
    }

    const countStatus = (status: string) => staged.files.filter(f => f.status === status).length;
    const totalLines = staged.totalAdditions + staged.totalDeletions;

    return {
        totalLinesChanged: totalLines,
        totalFiles: staged.files.length,
        filesAdded: countStatus('A'),
        filesModified: countStatus('M'),
        filesDeleted: countStatus('D'),
        filesRenamed: countStatus('R'),
        directoriesAffected: directories.size,
        fileTypes,
        complexityScore: calculateComplexityScore(
            totalLines,
            staged.files.length,
            directories.size,
            Object.keys(fileTypes).length
        ),
    };
}
