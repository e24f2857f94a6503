import { ConventionalCommit, ValidationResult, validateCommit } from './ConventionalCommit';
import { parseCommitType } from './CommitTypes';

const HEADER_PATTERN = /^(\w+)(?:\(([^)]+)\))?(!)?:\s*(.+)$/;
const BREAKING_MARKER = 'BREAKING CHANGE:';
const BREAKING_LINE_PATTERN = /^BREAKING CHANGE:/m;
const TRAILER_PATTERN = /^[\w-]+(-by)?:\s/i;
const ISSUE_REFERENCE_PATTERN = /^(Fixes|Closes|Resolves)\s+#\d+/i;

/**
 * Parse commit text back into the model. Returns null when the header is not
 * `type[(scope)][!]: subject` or the type keyword is unknown.
 */
export function parseCommit(message: string): ConventionalCommit | null {
    const lines = message.trim().split('\n');
    const match = HEADER_PATTERN.exec(lines[0]);
    if (!match) {
        return null;
    }

    const [, typeToken, scope, bang, rawSubject] = match;
    const type = parseCommitType(typeToken);
    if (!type) {
        return null;
    }

    const commit: ConventionalCommit = {
        type,
        scope: scope ?? null,
        subject: rawSubject.trim(),
        body: null,
        footer: null,
        breaking: bang !== undefined,
        breakingDescription: null,
    };

    if (lines.length < 2) {
        return commit;
    }

    // Skip the blank separator after the header
    const remaining = (lines[1] === '' ? lines.slice(2) : lines.slice(1)).join('\n');

    // Only a marker that opens a line counts; prose may mention it
    const marker = BREAKING_LINE_PATTERN.exec(remaining);
    if (marker) {
        const markerIndex = marker.index;
        const before = remaining.slice(0, markerIndex).trim();
        const after = remaining.slice(markerIndex + BREAKING_MARKER.length).trim();
        const newline = after.indexOf('\n');

        commit.body = before || null;
        commit.breakingDescription = (newline === -1 ? after : after.slice(0, newline)).trim();
        commit.footer = newline === -1 ? null : after.slice(newline + 1).trim() || null;
        commit.breaking = true;
        return commit;
    }

    const bodyLines: string[] = [];
    const footerLines: string[] = [];
    let inFooter = false;

    for (const line of remaining.split('\n')) {
        if (inFooter || TRAILER_PATTERN.test(line) || ISSUE_REFERENCE_PATTERN.test(line)) {
            inFooter = true;
            footerLines.push(line);
        } else {
            bodyLines.push(line);
        }
    }

    commit.body = bodyLines.join('\n').trim() || null;
    commit.footer = footerLines.join('\n').trim() || null;
    return commit;
}

/**
 * Parse and validate raw commit text, e.g. from a commit-msg hook.
 */
export function validateCommitMessage(message: string): ValidationResult {
    const parsed = parseCommit(message);
    if (!parsed) {
        return { isValid: false, errors: ['Message does not follow Conventional Commits format.'] };
    }
    return validateCommit(parsed);
}
