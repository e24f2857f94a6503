import fs from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import logger from './logger';

export interface EnvLoadResult {
    loadedFrom: string[];
    tried: string[];
    errors: string[];
}

/**
 * Loads .env files from the repository being inspected, the working
 * directory and the user's home, in that order. Earlier files win because
 * dotenv never overwrites a variable that is already set.
 */
export class EnvLoader {
    constructor(private readonly homeDir: string = os.homedir()) {}

    load(repoPath?: string): EnvLoadResult {
        const tried: string[] = [];
        const loadedFrom: string[] = [];
        const errors: string[] = [];

        for (const candidate of this.buildCandidatePaths(repoPath)) {
            if (tried.includes(candidate)) continue;
            tried.push(candidate);

            if (!fs.existsSync(candidate)) {
                continue;
            }

            const result = dotenv.config({ path: candidate });
            if (result.error) {
                errors.push(result.error.message);
                logger.warn(`Failed to load env file ${candidate}: ${result.error.message}`);
            } else {
                loadedFrom.push(candidate);
                logger.debug(`Loaded environment variables from ${candidate}`);
            }
        }

        return { loadedFrom, tried, errors };
    }

    private buildCandidatePaths(repoPath?: string): string[] {
        const paths: string[] = [];

        if (repoPath) {
            paths.push(path.resolve(repoPath, '.env'));
        }

        paths.push(path.resolve(process.cwd(), '.env'));

        // User-level override
        paths.push(path.join(this.homeDir, '.covcommit.env'));

        return paths;
    }
}
