import { detectCommitType } from '../CommitTypeDetector';

describe('detectCommitType', () => {
    it('returns chore for no files', () => {
        expect(detectCommitType([])).toBe('chore');
    });

    it('picks the type with the most matching files', () => {
        expect(detectCommitType(['tests/a.test.ts', 'tests/b.test.ts', 'README.md'])).toBe('test');
    });

    it('breaks ties in table order', () => {
        expect(detectCommitType(['README.md', 'src/app.spec.ts'])).toBe('docs');
    });

    it('detects ci and build files', () => {
        expect(detectCommitType(['.github/workflows/build.yml'])).toBe('ci');
        expect(detectCommitType(['package.json'])).toBe('build');
        expect(detectCommitType(['tsconfig.json'])).toBe('chore');
    });

    it('falls back to keywords in the diff', () => {
        expect(detectCommitType(['src/core.ts'], '+ // fix crash on empty input')).toBe('fix');
        expect(detectCommitType(['src/core.ts'], '+ implement streaming')).toBe('feat');
        expect(detectCommitType(['src/core.ts'], '+ rename helper')).toBe('refactor');
        expect(detectCommitType(['src/core.ts'], '+ faster lookups via cache')).toBe('perf');
    });

    it('defaults to feat for plain source files', () => {
        expect(detectCommitType(['src/core.ts', 'src/util.ts'])).toBe('feat');
    });
});
