import fs from 'fs';
import os from 'os';
import path from 'path';
import { program, stripCommentLines } from '../index';
import { paint, printError } from '../output';
import { ReportNotFoundError } from '../../models/Errors';

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

describe('CLI', () => {
    let tmpRoot: string;
    let exitSpy: jest.SpyInstance;
    let logSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'covcommit-cli-'));
        exitSpy = jest.spyOn(process, 'exit').mockImplementation((() => undefined) as () => never);
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
        fs.rmSync(tmpRoot, { recursive: true, force: true });
    });

    it('registers the coverage and commit commands', () => {
        const commit = program.commands.find(command => command.name() === 'commit');

        expect(program.commands.map(command => command.name())).toEqual(['coverage', 'commit']);
        expect(commit?.commands.map(command => command.name())).toEqual(['plan', 'validate', 'create', 'types']);
    });

    it('accepts a valid commit message', async () => {
        await program.parseAsync(['commit', 'validate', 'feat(cli): add validate command'], { from: 'user' });

        expect(logSpy).toHaveBeenCalledWith(paint('green', 'Commit message is valid.'));
        expect(exitSpy).not.toHaveBeenCalled();
    });

    it('exits with status 1 for an invalid message', async () => {
        await program.parseAsync(['commit', 'validate', 'feat: add thing.'], { from: 'user' });

        expect(errorSpy).toHaveBeenCalledWith('  - Subject should not end with a period.');
        expect(exitSpy).toHaveBeenCalledWith(1);
    });

    it('reads the message from a file and drops comment lines', async () => {
        const messagePath = path.join(tmpRoot, 'COMMIT_EDITMSG');
        fs.writeFileSync(messagePath, 'fix: handle empty pages\n# Please enter the commit message\n');

        await program.parseAsync(['commit', 'validate', '--file', messagePath], { from: 'user' });

        expect(logSpy).toHaveBeenCalledWith(paint('green', 'Commit message is valid.'));
    });

    it('prints a coverage summary for a report directory', async () => {
        fs.writeFileSync(path.join(tmpRoot, 'index.html'), '<title>JaCoCo</title>');
        fs.writeFileSync(
            path.join(tmpRoot, 'Foo.java.html'),
            '<pre><span class="nc" id="L4">return null;</span></pre>'
        );
        const outputPath = path.join(tmpRoot, 'out', 'coverage.json');

        await program.parseAsync(['coverage', tmpRoot, '-o', outputPath], { from: 'user' });

        expect(logSpy).toHaveBeenCalledWith('Files analyzed: 1');
        expect(logSpy).toHaveBeenCalledWith('- Foo.java.html:4 return null;');
        expect(JSON.parse(fs.readFileSync(outputPath, 'utf-8')).summary).toEqual({
            total_files_analyzed: 1,
            total_missed_branches: 0,
            total_uncovered_lines: 1,
        });
        expect(exitSpy).not.toHaveBeenCalled();
    });

    it('lists commit types with descriptions', async () => {
        await program.parseAsync(['commit', 'types'], { from: 'user' });

        expect(logSpy).toHaveBeenCalledTimes(11);
        expect(logSpy).toHaveBeenNthCalledWith(1, `${paint('green', 'feat      ')}A new feature`);
    });

    it('prints hints of known errors', () => {
        printError(new ReportNotFoundError('No report', 'Pass the report directory.'));

        expect(errorSpy).toHaveBeenNthCalledWith(1, `\n${paint('red', 'Error:')} No report`);
        expect(errorSpy).toHaveBeenNthCalledWith(2, 'Hint: Pass the report directory.');
    });
});

describe('stripCommentLines', () => {
    it('removes lines starting with #', () => {
        expect(stripCommentLines('feat: x\n\n# comment\nbody')).toBe('feat: x\n\nbody');
    });
});
