import { ConventionalCommit, formatCommit, MAX_BODY_LINE_LENGTH, MAX_SUBJECT_LENGTH } from './ConventionalCommit';
import { CommitType } from './CommitTypes';

export const DEFAULT_SUBJECT = 'update code';

export interface CommitMessageOptions {
    type: CommitType;
    subject: string;
    scope?: string | null;
    body?: string | null;
    footer?: string | null;
    breaking?: boolean;
    breakingDescription?: string | null;
}

/**
 * Collapse whitespace onto one line, lowercase the first letter, drop
 * trailing periods, truncate to the subject limit with a `...` suffix.
 */
export function formatSubject(subject: string): string {
    let formatted = collapseWhitespace(subject);
    if (!formatted) {
        return formatted;
    }

    formatted = formatted[0].toLowerCase() + formatted.slice(1);
    formatted = formatted.replace(/\.+$/, '').trimEnd();

    if (formatted.length > MAX_SUBJECT_LENGTH) {
        formatted = formatted.slice(0, MAX_SUBJECT_LENGTH - 3) + '...';
    }

    return formatted;
}

/**
 * Wrap body lines at 72 characters. Code fences, indented lines and
 * bullets pass through untouched.
 */
export function formatBody(body: string): string {
    if (!body) {
        return body;
    }

    const formatted: string[] = [];
    for (const line of body.split('\n')) {
        if (isPreformatted(line)) {
            formatted.push(line);
        } else if (line.length > MAX_BODY_LINE_LENGTH) {
            formatted.push(...wrapLine(line));
        } else {
            formatted.push(line);
        }
    }

    return formatted.join('\n');
}

function isPreformatted(line: string): boolean {
    return line.startsWith('```') || line.startsWith('  ') || line.startsWith('- ') || line.startsWith('* ');
}

/**
 * Greedy word wrap. A single word longer than the limit gets its own line.
 */
export function wrapLine(line: string, width: number = MAX_BODY_LINE_LENGTH): string[] {
    const words = line.split(/\s+/).filter(word => word.length > 0);
    const lines: string[] = [];
    let current: string[] = [];
    let currentLength = 0;

    for (const word of words) {
        const separator = current.length > 0 ? 1 : 0;
        if (currentLength + separator + word.length <= width) {
            current.push(word);
            currentLength += separator + word.length;
        } else {
            if (current.length > 0) {
                lines.push(current.join(' '));
            }
            current = [word];
            currentLength = word.length;
        }
    }

    if (current.length > 0) {
        lines.push(current.join(' '));
    }

    return lines;
}

export function formatBulletList(items: string[]): string {
    return items.map(item => `- ${item}`).join('\n');
}

function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

function trimBlankLines(text: string): string {
    return text.replace(/^(?:[ \t]*\n)+/, '').trimEnd();
}

// The header keeps the scope between parentheses on one line
function formatScope(scope: string): string {
    return collapseWhitespace(scope.replace(/[()]/g, ''));
}

/**
 * Build a model with every field normalized so that the formatted text
 * parses back to the same header and breaking change. An empty subject
 * becomes `update code`; a breaking description is kept only for a
 * breaking commit.
 */
export function createCommit(options: CommitMessageOptions): ConventionalCommit {
    const breaking = options.breaking ?? false;
    const body = options.body ? trimBlankLines(formatBody(options.body)) : '';
    const footer = options.footer ? options.footer.trim() : '';
    const breakingDescription = breaking && options.breakingDescription
        ? collapseWhitespace(options.breakingDescription)
        : '';

    return {
        type: options.type,
        scope: options.scope ? formatScope(options.scope) || null : null,
        subject: formatSubject(options.subject) || DEFAULT_SUBJECT,
        body: body || null,
        footer: footer || null,
        breaking,
        breakingDescription: breakingDescription || null,
    };
}

export function createCommitMessage(options: CommitMessageOptions): string {
    return formatCommit(createCommit(options));
}
