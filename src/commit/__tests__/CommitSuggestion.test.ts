import { commitFromSuggestion, fallbackCommitForChanges, fallbackCommitForGroup } from '../CommitSuggestion';
import { createGroup } from '../CommitSplitter';
import { FileChange } from '../../models/ChangeModels';

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

function file(filePath: string): FileChange {
    return { filePath, status: 'M', additions: 1, deletions: 0, isBinary: false };
}

describe('commitFromSuggestion', () => {
    it('normalizes a generated suggestion', () => {
        const suggestion = commitFromSuggestion({
            type: 'FIX',
            scope: 'parser',
            subject: 'Handle eof.',
            breaking: true,
            breaking_description: 'empty pages now return no lines',
        });

        expect(suggestion?.confidence).toBe(0.9);
        expect(suggestion?.formattedMessage).toBe(
            'fix(parser)!: handle eof\n\nBREAKING CHANGE: empty pages now return no lines'
        );
    });

    it('fills gaps with defaults', () => {
        expect(commitFromSuggestion({ type: 'wip', scope: null })?.formattedMessage).toBe('chore: update code');
    });

    it('rejects payloads of the wrong shape', () => {
        expect(commitFromSuggestion('feat: hello')).toBeNull();
        expect(commitFromSuggestion({ breaking: 'yes' })).toBeNull();
    });
});

describe('fallbackCommitForGroup', () => {
    it('uses the category subject and the shared scope', () => {
        const suggestion = fallbackCommitForGroup(createGroup([file('tests/test_api.py')], 'test'));

        expect(suggestion.confidence).toBe(0.5);
        expect(suggestion.formattedMessage).toBe('test(tests): update tests');
    });
});

describe('fallbackCommitForChanges', () => {
    it('picks the dominant category and reads type hints from the diff', () => {
        const suggestion = fallbackCommitForChanges({
            files: [file('src/api/users.py'), file('src/api/auth.py')],
            totalAdditions: 2,
            totalDeletions: 0,
            totalFiles: 2,
            diffContent: '+    # fix null check',
        });

        expect(suggestion.formattedMessage).toBe('fix(api): update source code');
    });
});
