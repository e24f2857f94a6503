/**
 * Configuration schema for covcommit
 */
export interface AppConfig {
    coverage: {
        /** 7z-compatible executable used when no in-process decoder is available */
        seven_zip_path?: string;
        /** Parent directory for archive scratch space */
        scratch_dir?: string;
    };
    commit: {
        max_commit_size: number;
        complexity_threshold: number;
    };
    output: {
        artifacts_dir: string;
        verbose: boolean;
    };
}

export type PartialAppConfig = {
    [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: AppConfig = {
    coverage: {},
    commit: {
        max_commit_size: 200,
        complexity_threshold: 50,
    },
    output: {
        artifacts_dir: './artifacts',
        verbose: false,
    },
};

export const DEFAULT_CONFIG_FILE = '.covcommit.yml';
