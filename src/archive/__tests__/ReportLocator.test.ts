import fs from 'fs';
import os from 'os';
import path from 'path';
import { findJacocoIndex } from '../ReportLocator';

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

function write(filePath: string, content: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
}

describe('findJacocoIndex', () => {
    let tmpRoot: string;

    beforeEach(() => {
        tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'report-locator-'));
    });

    afterEach(() => {
        fs.rmSync(tmpRoot, { recursive: true, force: true });
    });

    it('prefers conventional build locations', async () => {
        write(path.join(tmpRoot, 'build', 'reports', 'jacoco', 'test', 'html', 'index.html'), '<html></html>');
        write(path.join(tmpRoot, 'aaa', 'index.html'), 'JaCoCo');

        expect(await findJacocoIndex(tmpRoot)).toBe(path.join(tmpRoot, 'build', 'reports', 'jacoco', 'test', 'html', 'index.html'));
    });

    it('searches subdirectories for an index that mentions coverage', async () => {
        write(path.join(tmpRoot, 'a', 'index.html'), '<html><title>Site</title></html>');
        write(path.join(tmpRoot, 'b', 'nested', 'index.html'), '<html><title>Code Coverage</title></html>');
        write(path.join(tmpRoot, 'c', 'index.html'), '<html><title>JaCoCo</title></html>');

        expect(await findJacocoIndex(tmpRoot)).toBe(path.join(tmpRoot, 'b', 'nested', 'index.html'));
    });

    it('checks a directory index before descending', async () => {
        write(path.join(tmpRoot, 'out', 'index.html'), 'jacoco report');
        write(path.join(tmpRoot, 'out', 'deeper', 'index.html'), 'jacoco report');

        expect(await findJacocoIndex(tmpRoot)).toBe(path.join(tmpRoot, 'out', 'index.html'));
    });

    it('only sniffs the start of the file', async () => {
        write(path.join(tmpRoot, 'x', 'index.html'), `${' '.repeat(1000)}jacoco`);

        expect(await findJacocoIndex(tmpRoot)).toBeNull();
    });

    it('returns null for a directory that does not exist', async () => {
        expect(await findJacocoIndex(path.join(tmpRoot, 'missing'))).toBeNull();
    });
});
