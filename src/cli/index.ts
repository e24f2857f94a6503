#!/usr/bin/env node

import fs from 'fs/promises';
import { Command, InvalidArgumentError } from 'commander';
import { ConfigLoader } from '../config/ConfigLoader';
import { AppConfig } from '../config/schema';
import { CoverageAnalyzer, ReportSource } from '../analyzer/CoverageAnalyzer';
import { CommitSplitter } from '../commit/CommitSplitter';
import { validateCommitMessage } from '../commit/CommitParser';
import { createCommit } from '../commit/CommitMessageFormatter';
import { fallbackCommitForChanges } from '../commit/CommitSuggestion';
import { formatCommit, validateCommit } from '../commit/ConventionalCommit';
import { ALL_COMMIT_TYPES, COMMIT_TYPES, describeCommitType, parseCommitType } from '../commit/CommitTypes';
import { GitOperations } from '../repo/GitOperations';
import { ReportGenerator, serializeProposal } from '../reporter/ReportGenerator';
import { CommitError, NoStagedChangesError } from '../models/Errors';
import { dirExists, expandUserPath } from '../utils/fileUtils';
import { EnvLoader } from '../utils/EnvLoader';
import logger from '../utils/logger';
import { paint, printCoverageSummary, printError, printSplitProposal, printStagedChanges } from './output';

export interface CoverageCliOptions {
    config?: string;
    output?: string;
    sevenZip?: string;
    limit: number;
}

export interface PlanCliOptions {
    config?: string;
    repo?: string;
    maxCommitSize?: number;
    complexityThreshold?: number;
    json?: boolean;
    save?: boolean;
    output?: string;
}

export interface ValidateCliOptions {
    file?: string;
}

export interface CreateCliOptions {
    config?: string;
    repo?: string;
    type?: string;
    scope?: string;
    subject?: string;
    body?: string;
    footer?: string;
    breaking?: string | boolean;
    dryRun?: boolean;
    allowInvalid?: boolean;
}

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

const program = new Command();

program
    .name('covcommit')
    .description('JaCoCo coverage gap analysis and Conventional Commit splitting')
    .version('1.0.0');

program
    .command('coverage')
    .description('List missed branches and uncovered lines from a JaCoCo HTML report')
    .argument('<source>', 'Report directory or .zip/.7z archive')
    .option('-c, --config <path>', 'Custom config file')
    .option('-o, --output <file>', 'Write the JSON export to this file')
    .option('--seven-zip <path>', '7-Zip executable for .7z archives')
    .option('--limit <number>', 'Entries printed per list', parseInteger, 20)
    .action(coverageAction);

const commit = program
    .command('commit')
    .description('Inspect staged changes and write Conventional Commit messages');

commit
    .command('plan')
    .description('Analyze staged changes and suggest how to split them')
    .option('-c, --config <path>', 'Custom config file')
    .option('-r, --repo <path>', 'Repository path', '.')
    .option('--max-commit-size <lines>', 'Changed lines above which a split is suggested', parseInteger)
    .option('--complexity-threshold <score>', 'Complexity score above which a split is suggested', parseInteger)
    .option('--json', 'Print the proposal as JSON')
    .option('--save', 'Also write split-proposal.json to the artifacts directory')
    .option('-o, --output <dir>', 'Directory for split-proposal.json (implies --save)')
    .action(planAction);

commit
    .command('validate')
    .description('Validate a commit message against Conventional Commits style rules')
    .argument('[message]', 'Commit message text')
    .option('-f, --file <path>', 'Read the message from a file (e.g. in a commit-msg hook)')
    .action(validateAction);

commit
    .command('create')
    .description('Format, validate and commit the staged changes')
    .option('-c, --config <path>', 'Custom config file')
    .option('-r, --repo <path>', 'Repository path', '.')
    .option('-t, --type <type>', 'Commit type (feat, fix, docs, ...)')
    .option('-s, --scope <scope>', 'Commit scope')
    .option('-m, --subject <subject>', 'Subject line; derived from the staged files when omitted')
    .option('-b, --body <body>', 'Commit body')
    .option('--footer <footer>', 'Footer such as "Closes #12"')
    .option('--breaking [description]', 'Mark as a breaking change')
    .option('--dry-run', 'Print the message without committing')
    .option('--allow-invalid', 'Commit even when style validation fails')
    .action(createAction);

commit
    .command('types')
    .description('List the commit types')
    .action(() => {
        ALL_COMMIT_TYPES.forEach(type => {
            console.log(`${paint(COMMIT_TYPES[type].color, type.padEnd(10))}${describeCommitType(type)}`);
        });
    });

async function loadConfig(configPath?: string, repoPath?: string): Promise<AppConfig> {
    new EnvLoader().load(repoPath);
    const config = await new ConfigLoader().load(configPath);
    if (config.output.verbose) {
        logger.level = 'debug';
    }
    return config;
}

function fail(error: unknown): never {
    logger.error(`covcommit failed: ${error instanceof Error ? error.message : String(error)}`);
    printError(error);
    process.exit(1);
}

async function coverageAction(source: string, options: CoverageCliOptions): Promise<void> {
    try {
        const config = await loadConfig(options.config);
        const analyzer = new CoverageAnalyzer({
            sevenZipPath: options.sevenZip ?? config.coverage.seven_zip_path,
            scratchDir: config.coverage.scratch_dir,
        });

        const input = expandUserPath(source);
        const reportSource: ReportSource = (await dirExists(input)) ? { reportDir: input } : { archivePath: input };
        const result = await analyzer.analyzeReport(reportSource);

        printCoverageSummary(result, options.limit);

        if (options.output) {
            const jsonPath = await new ReportGenerator().writeCoverageReport(result, options.output);
            console.log(`\nJSON Report: ${jsonPath}`);
        }
    } catch (error) {
        fail(error);
    }
}

async function planAction(options: PlanCliOptions): Promise<void> {
    try {
        const config = await loadConfig(options.config, options.repo);
        const git = await GitOperations.open(options.repo);
        const staged = await git.getStagedChanges();
        if (staged.totalFiles === 0) {
            throw new NoStagedChangesError('No changes staged for commit.', "Use 'git add <file>' to stage changes.");
        }

        const metrics = await git.analyzeChangeComplexity(staged);
        const splitter = new CommitSplitter({
            maxCommitSize: options.maxCommitSize ?? config.commit.max_commit_size,
            complexityThreshold: options.complexityThreshold ?? config.commit.complexity_threshold,
        });
        const proposal = splitter.analyze(staged, metrics);

        if (options.json) {
            console.log(JSON.stringify(serializeProposal(proposal), null, 2));
        } else {
            printStagedChanges(staged, metrics);
            printSplitProposal(proposal);
        }

        if (options.save || options.output) {
            await new ReportGenerator().writeSplitProposal(proposal, options.output ?? config.output.artifacts_dir);
        }
    } catch (error) {
        fail(error);
    }
}

/**
 * Drop the comment lines git adds to COMMIT_EDITMSG
 */
export function stripCommentLines(message: string): string {
    return message
        .split('\n')
        .filter(line => !line.startsWith('#'))
        .join('\n');
}

async function validateAction(message: string | undefined, options: ValidateCliOptions): Promise<void> {
    try {
        let text = message;
        if (options.file) {
            text = stripCommentLines(await fs.readFile(options.file, 'utf-8'));
        }
        if (!text || !text.trim()) {
            throw new InvalidArgumentError('Provide a commit message or --file.');
        }

        const { isValid, errors } = validateCommitMessage(text);
        if (isValid) {
            console.log(paint('green', 'Commit message is valid.'));
            return;
        }

        console.error(paint('red', 'Commit message has problems:'));
        errors.forEach(error => console.error(`  - ${error}`));
        process.exit(1);
    } catch (error) {
        fail(error);
    }
}

async function createAction(options: CreateCliOptions): Promise<void> {
    try {
        await loadConfig(options.config, options.repo);
        const git = await GitOperations.open(options.repo);

        let message: string;
        if (options.subject) {
            const type = parseCommitType(options.type ?? 'feat');
            if (!type) {
                throw new InvalidArgumentError(`Unknown commit type: ${options.type}`);
            }
            const breaking = options.breaking !== undefined && options.breaking !== false;
            const model = createCommit({
                type,
                subject: options.subject,
                scope: options.scope,
                body: options.body,
                footer: options.footer,
                breaking,
                breakingDescription: typeof options.breaking === 'string' ? options.breaking : null,
            });

            const { isValid, errors } = validateCommit(model);
            if (!isValid) {
                console.warn(paint('yellow', 'Style problems:'));
                errors.forEach(error => console.warn(`  - ${error}`));
                if (!options.allowInvalid) {
                    process.exit(1);
                }
            }
            message = formatCommit(model);
        } else {
            const staged = await git.getStagedChanges();
            if (staged.totalFiles === 0) {
                throw new NoStagedChangesError('No changes staged for commit.', "Use 'git add <file>' to stage changes.");
            }
            message = fallbackCommitForChanges(staged).formattedMessage;
        }

        console.log(`\n${message}\n`);
        if (options.dryRun) {
            return;
        }

        const result = await git.createCommit(message);
        if (!result.success) {
            throw new CommitError(result.error ?? 'Commit failed.');
        }
        console.log(paint('green', `Created commit ${result.sha ?? ''}`));
        console.log(await git.showLastCommit());
    } catch (error) {
        fail(error);
    }
}

// Only parse arguments if this module is run directly
if (require.main === module) {
    program.parseAsync().catch(fail);
}

export { program };
