import { spawn } from 'child_process';
import logger from '../utils/logger';

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    duration: number;
}

/**
 * Executes external programs and captures their output
 */
export class CommandRunner {
    /**
     * Run `executable` with `args` (no shell). Rejects with the spawn error,
     * e.g. `ENOENT` when the executable does not exist.
     */
    async execute(
        executable: string,
        args: string[],
        cwd: string = process.cwd(),
        timeout: number = 300000
    ): Promise<CommandResult> {
        const startTime = Date.now();

        logger.info(`Executing command: ${executable} ${args.join(' ')}`);

        return new Promise((resolve, reject) => {
            const child = spawn(executable, args, {
                cwd,
                env: { ...process.env, FORCE_COLOR: '0' },
            });

            let stdout = '';
            let stderr = '';

            child.stdout?.on('data', (data: Buffer) => {
                stdout += data.toString();
            });

            child.stderr?.on('data', (data: Buffer) => {
                stderr += data.toString();
            });

            const timeoutId = setTimeout(() => {
                child.kill();
                reject(new Error(`Command timed out after ${timeout}ms`));
            }, timeout);

            child.on('close', (code) => {
                clearTimeout(timeoutId);
                const duration = Date.now() - startTime;

                logger.info(`Command completed with exit code ${code} in ${duration}ms`);
                resolve({ exitCode: code ?? 0, stdout, stderr, duration });
            });

            child.on('error', (error) => {
                clearTimeout(timeoutId);
                logger.error(`Command execution error: ${error}`);
                reject(error);
            });
        });
    }
}
