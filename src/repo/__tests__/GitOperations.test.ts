import { GitOperations, parseNameStatus, parseNumstat } from '../GitOperations';
import { NotAGitRepositoryError } from '../../models/Errors';

const mockGit = {
    checkIsRepo: jest.fn(),
    revparse: jest.fn(),
    diff: jest.fn(),
    commit: jest.fn(),
    raw: jest.fn(),
};

jest.mock('simple-git', () => ({
    __esModule: true,
    default: jest.fn(() => mockGit),
}));

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const NAME_STATUS = [
    'M', 'src/app.ts',
    'A', 'src/new.ts',
    'D', 'old.txt',
    'R087', 'src/a.ts', 'src/b.ts',
    'C100', 'src/base.ts', 'src/copy.ts',
    'T', 'scripts/run.sh',
    '',
].join('\0');

const NUMSTAT = [
    '5\t2\tsrc/app.ts',
    '10\t0\tsrc/new.ts',
    '0\t3\told.txt',
    '1\t1\t',
    'src/a.ts',
    'src/b.ts',
    '-\t-\tlogo.png',
    '',
].join('\0');

function stageDiff(nameStatus: string, numstat: string, patch: string): void {
    mockGit.diff.mockImplementation(async (args: string[]) => {
        if (args.includes('--name-status')) return nameStatus;
        if (args.includes('--numstat')) return numstat;
        return patch;
    });
}

describe('parseNameStatus', () => {
    it('maps status letters per path', () => {
        const entries = parseNameStatus(NAME_STATUS);

        expect([...entries.entries()]).toEqual([
            ['src/app.ts', { status: 'M' }],
            ['src/new.ts', { status: 'A' }],
            ['old.txt', { status: 'D' }],
            ['src/b.ts', { status: 'R', oldPath: 'src/a.ts' }],
            ['src/copy.ts', { status: 'A' }],
            ['scripts/run.sh', { status: 'M' }],
        ]);
    });

    it('keeps non-ASCII and tab-bearing paths verbatim', () => {
        const entries = parseNameStatus(['A', 'café.ts', 'M', 'docs/a\tb.md', ''].join('\0'));

        expect([...entries.entries()]).toEqual([
            ['café.ts', { status: 'A' }],
            ['docs/a\tb.md', { status: 'M' }],
        ]);
    });
});

describe('parseNumstat', () => {
    it('reads counts, binary markers and renamed paths', () => {
        expect(parseNumstat(NUMSTAT)).toEqual([
            { filePath: 'src/app.ts', additions: 5, deletions: 2, isBinary: false },
            { filePath: 'src/new.ts', additions: 10, deletions: 0, isBinary: false },
            { filePath: 'old.txt', additions: 0, deletions: 3, isBinary: false },
            { filePath: 'src/b.ts', oldPath: 'src/a.ts', additions: 1, deletions: 1, isBinary: false },
            { filePath: 'logo.png', additions: 0, deletions: 0, isBinary: true },
        ]);
    });

    it('returns nothing for empty output', () => {
        expect(parseNumstat('')).toEqual([]);
    });
});

describe('GitOperations', () => {
    beforeEach(() => {
        jest.clearAllMocks();
        mockGit.checkIsRepo.mockResolvedValue(true);
        mockGit.revparse.mockResolvedValue('/work/repo\n');
    });

    it('refuses a directory outside any repository', async () => {
        mockGit.checkIsRepo.mockResolvedValue(false);

        await expect(GitOperations.open('/tmp/nowhere')).rejects.toBeInstanceOf(NotAGitRepositoryError);
    });

    it('resolves the repository top level', async () => {
        const git = await GitOperations.open('/work/repo/src');

        expect(git.repoPath).toBe('/work/repo');
        expect(mockGit.revparse).toHaveBeenCalledWith(['--show-toplevel']);
    });

    it('combines name-status and numstat into staged changes', async () => {
        stageDiff(NAME_STATUS, NUMSTAT, 'diff --git a/src/app.ts b/src/app.ts');
        const git = await GitOperations.open('/work/repo');

        const staged = await git.getStagedChanges();

        expect(staged.files).toEqual([
            { filePath: 'src/app.ts', status: 'M', additions: 5, deletions: 2, isBinary: false },
            { filePath: 'src/new.ts', status: 'A', additions: 10, deletions: 0, isBinary: false },
            { filePath: 'old.txt', status: 'D', additions: 0, deletions: 3, isBinary: false },
            { filePath: 'src/b.ts', status: 'R', additions: 1, deletions: 1, isBinary: false, oldPath: 'src/a.ts' },
            { filePath: 'logo.png', status: 'M', additions: 0, deletions: 0, isBinary: true },
        ]);
        expect(staged.totalAdditions).toBe(16);
        expect(staged.totalDeletions).toBe(6);
        expect(staged.totalFiles).toBe(5);
        expect(staged.diffContent).toBe('diff --git a/src/app.ts b/src/app.ts');
    });

    it('reports a staged non-ASCII file as added', async () => {
        stageDiff(['A', 'café.ts', ''].join('\0'), ['3\t0\tcafé.ts', ''].join('\0'), '');
        const git = await GitOperations.open('/work/repo');

        const staged = await git.getStagedChanges();

        expect(staged.files).toEqual([
            { filePath: 'café.ts', status: 'A', additions: 3, deletions: 0, isBinary: false },
        ]);
        expect(mockGit.diff).toHaveBeenCalledWith(['--cached', '--name-status', '-M', '-z']);
    });

    it('computes metrics from the staged changes', async () => {
        stageDiff(NAME_STATUS, NUMSTAT, '');
        const git = await GitOperations.open('/work/repo');

        const metrics = await git.analyzeChangeComplexity();

        expect(metrics.totalLinesChanged).toBe(22);
        expect(metrics.filesAdded).toBe(1);
        expect(metrics.filesRenamed).toBe(1);
        expect(metrics.directoriesAffected).toBe(1);
    });

    it('commits the staged changes', async () => {
        stageDiff(NAME_STATUS, NUMSTAT, '');
        mockGit.commit.mockResolvedValue({ commit: 'abc1234' });
        const git = await GitOperations.open('/work/repo');

        const result = await git.createCommit('feat: add thing');

        expect(mockGit.commit).toHaveBeenCalledWith('feat: add thing');
        expect(result).toEqual({ success: true, sha: 'abc1234', message: 'feat: add thing' });
    });

    it('reports an empty index without committing', async () => {
        stageDiff('', '', '');
        const git = await GitOperations.open('/work/repo');

        const result = await git.createCommit('feat: add thing');

        expect(mockGit.commit).not.toHaveBeenCalled();
        expect(result).toEqual({
            success: false,
            sha: null,
            message: 'feat: add thing',
            error: 'No changes staged for commit.',
        });
    });

    it('reports git failures in the result', async () => {
        stageDiff(NAME_STATUS, NUMSTAT, '');
        mockGit.commit.mockRejectedValue(new Error('pre-commit hook failed'));
        const git = await GitOperations.open('/work/repo');

        const result = await git.createCommit('fix: x');

        expect(result.success).toBe(false);
        expect(result.error).toBe('Git commit failed: pre-commit hook failed');
    });

    it('labels a detached HEAD', async () => {
        const git = await GitOperations.open('/work/repo');
        mockGit.revparse.mockResolvedValue('HEAD\n');

        expect(await git.getCurrentBranch()).toBe('HEAD (detached)');
    });
});
