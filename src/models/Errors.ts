/**
 * Base class for every error this tool raises on purpose.
 * `hint` carries a remediation step the CLI prints under the message.
 */
export class CovCommitError extends Error {
    readonly hint?: string;

    constructor(message: string, hint?: string) {
        super(message);
        this.name = new.target.name;
        this.hint = hint;
    }
}

export class InvalidArchiveError extends CovCommitError {}

export class UnsupportedArchiveError extends CovCommitError {}

export class ExtractionUnavailableError extends CovCommitError {}

export class ReportNotFoundError extends CovCommitError {}

export class ConfigurationError extends CovCommitError {}

export class GitOperationsError extends CovCommitError {}

export class NotAGitRepositoryError extends GitOperationsError {}

export class NoStagedChangesError extends GitOperationsError {}

export class CommitError extends GitOperationsError {}
