import { CommitType } from './CommitTypes';

export const MAX_SUBJECT_LENGTH = 50;
export const MAX_BODY_LINE_LENGTH = 72;

const SCOPE_PATTERN = /^[a-z][a-z0-9-]*$/;

export interface ConventionalCommit {
    type: CommitType;
    scope: string | null;
    subject: string;
    body: string | null;
    footer: string | null;
    breaking: boolean;
    breakingDescription: string | null;
}

export interface ValidationResult {
    isValid: boolean;
    errors: string[];
}

/**
 * Render a commit to its wire text:
 *
 *   type(scope)!: subject
 *
 *   body
 *
 *   BREAKING CHANGE: description
 *
 *   footer
 */
export function formatCommit(commit: ConventionalCommit): string {
    let header: string = commit.type;
    if (commit.scope) {
        header += `(${commit.scope})`;
    }
    if (commit.breaking) {
        header += '!';
    }
    header += `: ${commit.subject}`;

    const parts = [header];

    if (commit.body) {
        parts.push('', commit.body);
    }

    if (commit.breaking && commit.breakingDescription) {
        parts.push('', `BREAKING CHANGE: ${commit.breakingDescription}`);
    }

    if (commit.footer) {
        parts.push('', commit.footer);
    }

    return parts.join('\n');
}

/**
 * Check the style rules. Never throws; every violation is reported.
 */
export function validateCommit(commit: ConventionalCommit): ValidationResult {
    const errors: string[] = [];
    const { subject, body, scope } = commit;

    if (subject.length > MAX_SUBJECT_LENGTH) {
        errors.push(`Subject line too long (${subject.length} chars). Maximum is ${MAX_SUBJECT_LENGTH} characters.`);
    }

    if (subject && isUpperCase(subject[0])) {
        errors.push('Subject should start with lowercase letter.');
    }

    if (subject.endsWith('.')) {
        errors.push('Subject should not end with a period.');
    }

    if (body) {
        body.split('\n').forEach((line, index) => {
            if (line.length > MAX_BODY_LINE_LENGTH) {
                errors.push(
                    `Body line ${index + 1} too long (${line.length} chars). Maximum is ${MAX_BODY_LINE_LENGTH} characters.`
                );
            }
        });
    }

    if (scope && !SCOPE_PATTERN.test(scope)) {
        errors.push('Scope should be lowercase alphanumeric with hyphens.');
    }

    return { isValid: errors.length === 0, errors };
}

function isUpperCase(char: string): boolean {
    return char !== char.toLowerCase() && char === char.toUpperCase();
}
