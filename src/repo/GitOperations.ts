import simpleGit, { SimpleGit } from 'simple-git';
import path from 'path';
import { buildChangeMetrics } from '../commit/ChangeMetrics';
import { ChangeMetrics, CommitResult, FileChange, FileStatus, StagedChanges } from '../models/ChangeModels';
import { NoStagedChangesError, NotAGitRepositoryError } from '../models/Errors';
import logger from '../utils/logger';

interface NameStatusEntry {
    status: FileStatus;
    oldPath?: string;
}

interface NumstatEntry {
    filePath: string;
    oldPath?: string;
    additions: number;
    deletions: number;
    isBinary: boolean;
}

/**
 * Parse `git diff --name-status -M -z` output into path → status. Paths
 * arrive NUL-separated and unquoted, so non-ASCII names match numstat.
 * Copies count as additions and type changes as modifications.
 */
export function parseNameStatus(output: string): Map<string, NameStatusEntry> {
    const tokens = output.split('\0');
    const entries = new Map<string, NameStatusEntry>();

    let i = 0;
    while (i < tokens.length) {
        const letter = tokens[i++].trim().charAt(0);
        if (!letter) {
            continue;
        }

        // Renames and copies carry the source path, then the destination
        if (letter === 'R' || letter === 'C') {
            const oldPath = tokens[i++] ?? '';
            const newPath = tokens[i++] ?? '';
            if (newPath) {
                entries.set(newPath, letter === 'R' ? { status: 'R', oldPath } : { status: 'A' });
            }
            continue;
        }

        const filePath = tokens[i++] ?? '';
        if (filePath) {
            entries.set(filePath, letter === 'A' || letter === 'D' ? { status: letter } : { status: 'M' });
        }
    }

    return entries;
}

/**
 * Parse `git diff --numstat -M -z` output. Binary files report `-` for both
 * counts, which become zero.
 */
export function parseNumstat(output: string): NumstatEntry[] {
    const tokens = output.split('\0');
    const entries: NumstatEntry[] = [];

    let i = 0;
    while (i < tokens.length) {
        const token = tokens[i++];
        if (!token.trim()) {
            continue;
        }

        const [added, deleted, inlinePath] = token.replace(/^\n/, '').split('\t');
        const isBinary = added === '-' && deleted === '-';
        const counts = {
            additions: isBinary ? 0 : parseInt(added, 10) || 0,
            deletions: isBinary ? 0 : parseInt(deleted, 10) || 0,
            isBinary,
        };

        if (inlinePath) {
            entries.push({ filePath: inlinePath, ...counts });
        } else {
            // Renames and copies: the two paths follow as separate tokens
            const oldPath = tokens[i++] ?? '';
            const newPath = tokens[i++] ?? '';
            entries.push({ filePath: newPath, oldPath, ...counts });
        }
    }

    return entries;
}

/**
 * Stage inspection and commit creation for a local repository
 */
export class GitOperations {
    private constructor(
        private readonly git: SimpleGit,
        readonly repoPath: string
    ) {}

    /**
     * Open the repository containing `repoPath` (defaults to the cwd).
     */
    static async open(repoPath: string = process.cwd()): Promise<GitOperations> {
        const absolutePath = path.resolve(repoPath);
        const git = simpleGit(absolutePath);

        if (!(await git.checkIsRepo())) {
            throw new NotAGitRepositoryError(
                `Not a git repository: ${absolutePath}`,
                'Run this command from within a git repository or pass --repo.'
            );
        }

        const topLevel = (await git.revparse(['--show-toplevel'])).trim();
        logger.info(`Using git repository: ${topLevel}`);
        return new GitOperations(git, topLevel || absolutePath);
    }

    /**
     * Everything in the index relative to HEAD (`git diff --cached`).
     */
    async getStagedChanges(): Promise<StagedChanges> {
        const [nameStatus, numstat, diffContent] = await Promise.all([
            this.git.diff(['--cached', '--name-status', '-M', '-z']),
            this.git.diff(['--cached', '--numstat', '-M', '-z']),
            this.git.diff(['--cached', '--no-color']),
        ]);

        const statuses = parseNameStatus(nameStatus);
        const files: FileChange[] = parseNumstat(numstat).map(entry => {
            const status = statuses.get(entry.filePath);
            const change: FileChange = {
                filePath: entry.filePath,
                status: status?.status ?? 'M',
                additions: entry.additions,
                deletions: entry.deletions,
                isBinary: entry.isBinary,
            };
            const oldPath = status?.oldPath ?? entry.oldPath;
            if (change.status === 'R' && oldPath) {
                change.oldPath = oldPath;
            }
            return change;
        });

        const totalAdditions = files.reduce((sum, file) => sum + file.additions, 0);
        const totalDeletions = files.reduce((sum, file) => sum + file.deletions, 0);

        logger.debug(`Staged: ${files.length} files, +${totalAdditions} -${totalDeletions}`);
        return { files, totalAdditions, totalDeletions, totalFiles: files.length, diffContent };
    }

    async analyzeChangeComplexity(staged?: StagedChanges): Promise<ChangeMetrics> {
        return buildChangeMetrics(staged ?? (await this.getStagedChanges()));
    }

    async validateStagedChanges(): Promise<void> {
        const staged = await this.getStagedChanges();
        if (staged.totalFiles === 0) {
            throw new NoStagedChangesError(
                'No changes staged for commit.',
                "Use 'git add <file>' to stage changes."
            );
        }
    }

    /**
     * Commit the index with `message` used verbatim. Failures are reported in
     * the result rather than thrown.
     */
    async createCommit(message: string): Promise<CommitResult> {
        try {
            await this.validateStagedChanges();
            const result = await this.git.commit(message);
            logger.info(`Committed ${result.commit}: ${message.split('\n')[0]}`);
            return { success: true, sha: result.commit || null, message };
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            logger.error(`Failed to commit: ${reason}`);
            return {
                success: false,
                sha: null,
                message,
                error: error instanceof NoStagedChangesError ? reason : `Git commit failed: ${reason}`,
            };
        }
    }

    /**
     * `git log -1 --stat`
     */
    async showLastCommit(): Promise<string> {
        return await this.git.raw(['log', '-1', '--stat', '--no-color']);
    }

    async getCurrentBranch(): Promise<string> {
        const branch = (await this.git.revparse(['--abbrev-ref', 'HEAD'])).trim();
        return branch === 'HEAD' ? 'HEAD (detached)' : branch;
    }
}
