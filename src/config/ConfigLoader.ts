import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import { AppConfig, DEFAULT_CONFIG, DEFAULT_CONFIG_FILE, PartialAppConfig } from './schema';
import { ConfigurationError } from '../models/Errors';
import { fileExists } from '../utils/fileUtils';
import logger from '../utils/logger';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickSection<T extends object>(raw: Record<string, unknown>, key: string): Partial<T> {
    const section = raw[key];
    if (section === undefined) {
        return {};
    }
    if (!isRecord(section)) {
        logger.warn(`Ignoring config section "${key}": expected a mapping`);
        return {};
    }
    return section as Partial<T>;
}

export class ConfigLoader {
    private configSource: string = 'defaults';

    /**
     * Load configuration from file or use defaults, then apply environment
     * overrides and validate.
     */
    async load(configPath?: string): Promise<AppConfig> {
        let config: PartialAppConfig = {};

        if (configPath) {
            config = await this.loadFromFile(configPath);
            this.configSource = configPath;
        } else {
            const defaultPath = path.join(process.cwd(), DEFAULT_CONFIG_FILE);
            if (await fileExists(defaultPath)) {
                config = await this.loadFromFile(defaultPath);
                this.configSource = defaultPath;
            }
        }

        const mergedConfig = this.mergeWithDefaults(config);
        this.applyEnvironmentOverrides(mergedConfig);
        this.validate(mergedConfig);

        logger.info(`Configuration loaded successfully from: ${this.configSource}`);
        return mergedConfig;
    }

    getConfigSource(): string {
        return this.configSource;
    }

    /**
     * Load config from file; unreadable or malformed files count as empty
     */
    private async loadFromFile(filePath: string): Promise<PartialAppConfig> {
        try {
            const content = await fs.readFile(filePath, 'utf-8');
            const raw = yaml.load(content);
            if (raw === undefined || raw === null) {
                return {};
            }
            if (!isRecord(raw)) {
                logger.warn(`Config file ${filePath} is not a mapping; using defaults`);
                return {};
            }
            logger.info(`Loaded config from: ${filePath}`);
            return {
                coverage: pickSection<AppConfig['coverage']>(raw, 'coverage'),
                commit: pickSection<AppConfig['commit']>(raw, 'commit'),
                output: pickSection<AppConfig['output']>(raw, 'output'),
            };
        } catch (error) {
            logger.warn(`Failed to load config from ${filePath}: ${error}`);
            return {};
        }
    }

    private mergeWithDefaults(config: PartialAppConfig): AppConfig {
        return {
            coverage: { ...DEFAULT_CONFIG.coverage, ...config.coverage },
            commit: { ...DEFAULT_CONFIG.commit, ...config.commit },
            output: { ...DEFAULT_CONFIG.output, ...config.output },
        };
    }

    private applyEnvironmentOverrides(config: AppConfig): void {
        if (process.env.SEVEN_ZIP_PATH) {
            config.coverage.seven_zip_path = process.env.SEVEN_ZIP_PATH;
        }
        if (process.env.COVCOMMIT_SCRATCH_DIR) {
            config.coverage.scratch_dir = process.env.COVCOMMIT_SCRATCH_DIR;
        }
        if (process.env.MAX_COMMIT_SIZE) {
            config.commit.max_commit_size = Number(process.env.MAX_COMMIT_SIZE);
        }
        if (process.env.COMPLEXITY_THRESHOLD) {
            config.commit.complexity_threshold = Number(process.env.COMPLEXITY_THRESHOLD);
        }
        if (process.env.VERBOSE === 'true') {
            config.output.verbose = true;
        }
    }

    private validate(config: AppConfig): void {
        const errors = validateConfig(config);
        if (errors.length > 0) {
            throw new ConfigurationError(
                'Configuration validation failed:\n' + errors.map(e => `  - ${e}`).join('\n')
            );
        }
    }
}

export function validateConfig(config: AppConfig): string[] {
    const errors: string[] = [];
    const { max_commit_size, complexity_threshold } = config.commit;

    if (!Number.isInteger(max_commit_size) || max_commit_size < 10) {
        errors.push('commit.max_commit_size must be an integer of at least 10.');
    }
    if (!Number.isInteger(complexity_threshold) || complexity_threshold < 0) {
        errors.push('commit.complexity_threshold must be a non-negative integer.');
    }
    if (config.coverage.seven_zip_path !== undefined && typeof config.coverage.seven_zip_path !== 'string') {
        errors.push('coverage.seven_zip_path must be a string.');
    }
    if (config.coverage.scratch_dir !== undefined && typeof config.coverage.scratch_dir !== 'string') {
        errors.push('coverage.scratch_dir must be a string.');
    }
    // YAML values reach here unchecked by pickSection
    if (typeof config.output.artifacts_dir !== 'string') {
        errors.push('output.artifacts_dir must be a string.');
    }
    if (typeof config.output.verbose !== 'boolean') {
        errors.push('output.verbose must be a boolean.');
    }

    return errors;
}
