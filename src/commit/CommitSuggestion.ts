import { z } from 'zod';
import { CommitType, parseCommitType } from './CommitTypes';
import { ConventionalCommit, formatCommit } from './ConventionalCommit';
import { createCommit, DEFAULT_SUBJECT } from './CommitMessageFormatter';
import { extractScope } from './ScopeExtractor';
import { categorize } from './FileCategorizer';
import { detectCommitType } from './CommitTypeDetector';
import { createGroup } from './CommitSplitter';
import { FileCategory, SplitGroup, StagedChanges } from '../models/ChangeModels';

/**
 * Shape expected back from the text generator. Every field is optional;
 * gaps are filled with defaults rather than rejected.
 */
const SuggestionSchema = z.object({
    type: z.string().optional(),
    scope: z.string().nullish(),
    subject: z.string().optional(),
    body: z.string().nullish(),
    footer: z.string().nullish(),
    breaking: z.boolean().optional(),
    breaking_description: z.string().nullish(),
});

export type CommitSuggestionPayload = z.infer<typeof SuggestionSchema>;

export interface SuggestedCommit {
    commit: ConventionalCommit;
    formattedMessage: string;
    /** 0.9 for generated suggestions, 0.5 for deterministic fallbacks */
    confidence: number;
}

/**
 * Normalize an untyped suggestion into a formatted commit. Returns null when
 * the payload is not an object of the expected shape.
 */
export function commitFromSuggestion(payload: unknown): SuggestedCommit | null {
    const parsed = SuggestionSchema.safeParse(payload);
    if (!parsed.success) {
        return null;
    }

    const data = parsed.data;
    const type: CommitType = (data.type && parseCommitType(data.type)) || 'chore';

    const commit = createCommit({
        type,
        subject: data.subject || DEFAULT_SUBJECT,
        scope: data.scope,
        body: data.body,
        footer: data.footer,
        breaking: data.breaking ?? false,
        breakingDescription: data.breaking_description,
    });

    return { commit, formattedMessage: formatCommit(commit), confidence: 0.9 };
}

const FALLBACK_SUBJECTS: Record<FileCategory, string> = {
    source: 'update source code',
    test: 'update tests',
    docs: 'update documentation',
    config: 'update configuration',
    build: 'update build configuration',
    style: 'update styles',
    other: 'update files',
};

/**
 * Deterministic message for a group when no generated text is available.
 */
export function fallbackCommitForGroup(group: SplitGroup): SuggestedCommit {
    const commit = createCommit({
        type: group.suggestedType,
        subject: FALLBACK_SUBJECTS[group.category],
        scope: extractScope(group.files.map(file => file.filePath)),
    });

    return { commit, formattedMessage: formatCommit(commit), confidence: 0.5 };
}

/**
 * Fallback for a whole changeset committed at once: the dominant category
 * picks the subject, and the diff text can refine the type.
 */
export function fallbackCommitForChanges(staged: StagedChanges): SuggestedCommit {
    const counts = new Map<FileCategory, number>();
    for (const file of staged.files) {
        const category = categorize(file.filePath);
        counts.set(category, (counts.get(category) ?? 0) + 1);
    }

    let dominant: FileCategory = 'other';
    let dominantCount = 0;
    for (const [category, count] of counts) {
        if (count > dominantCount) {
            dominant = category;
            dominantCount = count;
        }
    }

    const group = createGroup(staged.files, dominant);
    group.suggestedType = detectCommitType(staged.files.map(file => file.filePath), staged.diffContent);
    return fallbackCommitForGroup(group);
}
