import { makeTempDir, removeDir } from '../utils/fileUtils';
import logger from '../utils/logger';

const SCRATCH_PREFIX = 'covcommit-jacoco-';

/**
 * Run `work` with a fresh temporary directory that is removed afterwards,
 * whether `work` resolves or throws.
 */
export async function withScratchDirectory<T>(
    work: (scratchDir: string) => Promise<T>,
    parent?: string
): Promise<T> {
    const scratchDir = await makeTempDir(SCRATCH_PREFIX, parent);
    logger.debug(`Created scratch directory ${scratchDir}`);

    try {
        return await work(scratchDir);
    } finally {
        await removeDir(scratchDir);
        logger.debug(`Removed scratch directory ${scratchDir}`);
    }
}
