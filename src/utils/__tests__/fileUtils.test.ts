import fs from 'fs';
import os from 'os';
import path from 'path';
import { expandUserPath, findFiles, readHead } from '../fileUtils';

describe('expandUserPath', () => {
    const ORIGINAL_ENV = { ...process.env };

    afterEach(() => {
        process.env = { ...ORIGINAL_ENV };
    });

    it('expands a leading tilde', () => {
        expect(expandUserPath('~/reports/a.zip')).toBe(path.join(os.homedir(), 'reports/a.zip'));
    });

    it('expands bare and braced variables', () => {
        process.env.COVCOMMIT_TEST_ROOT = '/data';

        expect(expandUserPath('$COVCOMMIT_TEST_ROOT/x/${COVCOMMIT_TEST_ROOT}')).toBe('/data/x//data');
    });

    it('leaves unknown variables in place', () => {
        delete process.env.COVCOMMIT_TEST_UNSET;

        expect(expandUserPath('$COVCOMMIT_TEST_UNSET/a')).toBe('$COVCOMMIT_TEST_UNSET/a');
    });
});

describe('file helpers', () => {
    const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'file-utils-'));

    afterAll(() => {
        fs.rmSync(tmpRoot, { recursive: true, force: true });
    });

    it('reads only the head of a file', async () => {
        const filePath = path.join(tmpRoot, 'long.txt');
        fs.writeFileSync(filePath, 'abcdefghij');

        expect(await readHead(filePath, 4)).toBe('abcd');
    });

    it('finds files relative to a directory', async () => {
        fs.mkdirSync(path.join(tmpRoot, 'pkg'), { recursive: true });
        fs.writeFileSync(path.join(tmpRoot, 'pkg', 'A.html'), '');

        expect(await findFiles(tmpRoot, '**/*.html', { absolute: false })).toEqual(['pkg/A.html']);
    });
});
