import { Parser } from 'htmlparser2';
import { MissedBranch, PageCoverage, UncoveredLine } from '../models/CoverageModels';
import { readFileBytes } from '../utils/fileUtils';
import logger from '../utils/logger';

type ScanState = 'outside-pre' | 'inside-pre' | 'inside-line-span';

const LINE_ID_PATTERN = /^L(\d+)$/;
const DEFAULT_BRANCH_INFO = 'Partially covered';

interface OpenLine {
    lineNumber: number;
    markers: string[];
    title: string;
    text: string;
    /** Spans nested inside the line span that are still open */
    nestedSpans: number;
}

/**
 * Single-pass scanner over a JaCoCo per-class source page.
 *
 * JaCoCo renders the source inside one `<pre>`, one `<span id="L<n>">` per
 * line. The span's class carries the coverage marker (`fc`, `pc`, `nc`, plus
 * `bfc`/`bpc`/`bnc` for branch lines) and its title the branch tooltip.
 */
export class JacocoSourceScanner {
    private state: ScanState = 'outside-pre';
    private line: OpenLine | null = null;
    private readonly missedBranches: MissedBranch[] = [];
    private readonly uncoveredLines: UncoveredLine[] = [];
    private failure: Error | null = null;

    constructor(
        private readonly filePath: string,
        private readonly className: string
    ) {}

    scan(html: string): PageCoverage {
        const parser = new Parser({
            onopentag: (name, attribs) => this.openTag(name, attribs),
            ontext: text => this.text(text),
            onclosetag: name => this.closeTag(name),
            onerror: error => {
                this.failure = error;
            },
        });

        parser.write(html);
        parser.end();

        if (this.failure) {
            throw this.failure;
        }

        return { missedBranches: this.missedBranches, uncoveredLines: this.uncoveredLines };
    }

    private openTag(name: string, attribs: Record<string, string>): void {
        if (name === 'pre') {
            if (this.state === 'outside-pre') {
                this.state = 'inside-pre';
            }
            return;
        }

        if (name !== 'span') {
            return;
        }

        if (this.state === 'inside-line-span' && this.line) {
            this.line.nestedSpans++;
            return;
        }

        if (this.state === 'inside-pre') {
            const match = LINE_ID_PATTERN.exec(attribs.id ?? '');
            if (match) {
                this.line = {
                    lineNumber: parseInt(match[1], 10),
                    markers: (attribs.class ?? '').split(/\s+/).filter(Boolean),
                    title: attribs.title ?? '',
                    text: '',
                    nestedSpans: 0,
                };
                this.state = 'inside-line-span';
            }
        }
    }

    private text(data: string): void {
        if (this.state === 'inside-line-span' && this.line) {
            this.line.text += data;
        }
    }

    private closeTag(name: string): void {
        if (name === 'pre') {
            // Spans are always closed within their <pre>; anything still open is dropped
            this.line = null;
            this.state = 'outside-pre';
            return;
        }

        if (name !== 'span' || this.state !== 'inside-line-span' || !this.line) {
            return;
        }

        if (this.line.nestedSpans > 0) {
            this.line.nestedSpans--;
            return;
        }

        this.emit(this.line);
        this.line = null;
        this.state = 'inside-pre';
    }

    private emit(line: OpenLine): void {
        const sourceLine = line.text.trim();
        if (!sourceLine) {
            return;
        }

        // pc and nc are checked independently; a line carrying both lands in both lists
        if (line.markers.includes('pc')) {
            this.missedBranches.push({
                filePath: this.filePath,
                className: this.className,
                lineNumber: line.lineNumber,
                branchInfo: line.title || DEFAULT_BRANCH_INFO,
                sourceLine,
            });
        }

        if (line.markers.includes('nc')) {
            this.uncoveredLines.push({
                filePath: this.filePath,
                className: this.className,
                lineNumber: line.lineNumber,
                sourceLine,
            });
        }
    }
}

/**
 * Extract coverage markers from one page's HTML.
 */
export function parseSourcePage(html: string, filePath: string, className: string): PageCoverage {
    return new JacocoSourceScanner(filePath, className).scan(html);
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Read and scan one page. A page that fails to decode or scan contributes
 * nothing; the failure is logged and the run continues.
 */
export async function parseSourceFile(filePath: string, className: string): Promise<PageCoverage> {
    try {
        const html = utf8.decode(await readFileBytes(filePath));
        return parseSourcePage(html, filePath, className);
    } catch (error) {
        logger.warn(`Skipping unreadable coverage page ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
        return { missedBranches: [], uncoveredLines: [] };
    }
}
