import fs from 'fs';
import os from 'os';
import path from 'path';
import { EnvLoader } from '../EnvLoader';

jest.mock('../logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const ORIGINAL_ENV = { ...process.env };

describe('EnvLoader', () => {
    const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'env-loader-'));
    const homeDir = path.join(tmpRoot, 'home');

    beforeAll(() => {
        fs.mkdirSync(homeDir, { recursive: true });
        fs.writeFileSync(path.join(homeDir, '.covcommit.env'), 'LOADER_TEST_HOME=from_home\nLOADER_TEST_TOKEN=from_home');
    });

    afterEach(() => {
        process.env = { ...ORIGINAL_ENV };
    });

    afterAll(() => {
        fs.rmSync(tmpRoot, { recursive: true, force: true });
    });

    it('loads variables from a target repository .env', () => {
        const repoDir = path.join(tmpRoot, 'repo');
        fs.mkdirSync(repoDir, { recursive: true });
        const envPath = path.join(repoDir, '.env');
        fs.writeFileSync(envPath, 'LOADER_TEST_TOKEN=from_repo');

        const result = new EnvLoader(homeDir).load(repoDir);

        expect(process.env.LOADER_TEST_TOKEN).toBe('from_repo');
        expect(result.loadedFrom[0]).toBe(envPath);
        expect(result.tried[0]).toBe(envPath);
    });

    it('falls back to the user level file', () => {
        const result = new EnvLoader(homeDir).load(path.join(tmpRoot, 'non-existent'));

        expect(process.env.LOADER_TEST_HOME).toBe('from_home');
        expect(result.tried[result.tried.length - 1]).toBe(path.join(homeDir, '.covcommit.env'));
        expect(result.loadedFrom).toContain(path.join(homeDir, '.covcommit.env'));
        expect(result.errors).toEqual([]);
    });
});
