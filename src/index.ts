export * from './models/Errors';
export * from './models/CoverageModels';
export * from './models/ChangeModels';

export { ArchiveExtractor, ArchiveExtractorOptions, ArchiveKind, SevenZipDecoder, archiveKind } from './archive/ArchiveExtractor';
export { CONVENTIONAL_INDEX_PATHS, findJacocoIndex } from './archive/ReportLocator';
export { withScratchDirectory } from './archive/ScratchDirectory';

export { CoverageAnalyzer, CoverageAnalyzerOptions, ReportSource, findSourcePages } from './analyzer/CoverageAnalyzer';
export { JacocoSourceScanner, parseSourceFile, parseSourcePage } from './analyzer/JacocoSourceParser';
export { formatAnalysisResult, sortForDisplay } from './analyzer/CoverageExport';

export * from './commit/CommitTypes';
export * from './commit/ConventionalCommit';
export * from './commit/CommitParser';
export * from './commit/CommitMessageFormatter';
export * from './commit/ScopeExtractor';
export * from './commit/CommitTypeDetector';
export * from './commit/FileCategorizer';
export * from './commit/ComponentDetector';
export * from './commit/ChangeMetrics';
export * from './commit/CommitSplitter';
export * from './commit/CommitSuggestion';

export { GitOperations, parseNameStatus, parseNumstat } from './repo/GitOperations';
export { ConfigLoader, validateConfig } from './config/ConfigLoader';
export { AppConfig, PartialAppConfig, DEFAULT_CONFIG, DEFAULT_CONFIG_FILE } from './config/schema';
export { ReportGenerator, serializeProposal } from './reporter/ReportGenerator';
