/**
 * Insight Bank Kit
 *
 * Library entry point: read, check, clean, generate, export and serve
 * numerology insight banks.
 */

// Core
export * from './core/constants.js';
export * from './core/types.js';
export * from './core/errors.js';
export { OutputSanitizer, getSanitizer, sanitize } from './core/OutputSanitizer.js';

// Configuration
export { ConfigLoader, parseYaml, validateConfig, resolveDataPath, CONFIG_FILE_NAMES } from './config/ConfigLoader.js';
export type { LoadOptions, LoadedConfiguration } from './config/ConfigLoader.js';
export * from './config/types.js';

// Schema
export { parseBankJson, validateBankDocument, serializeBank, stringifyBank } from './schema/BankSchema.js';
export type { BankValidationResult, ValidateOptions } from './schema/BankSchema.js';

// Archive
export * from './archive/ArchiveParser.js';
export { ArchiveReader, DEFAULT_ARCHIVE_PATTERNS } from './archive/ArchiveReader.js';
export type { ArchiveReaderOptions } from './archive/ArchiveReader.js';
export { ArchiveWriter, renderBankMarkdown, bankFileName } from './archive/ArchiveWriter.js';
export type { WriteBankOptions } from './archive/ArchiveWriter.js';

// Quality
export * from './lint/ContentLinter.js';
export * from './normalize/Artifacts.js';
export * from './normalize/ContentNormalizer.js';
export * from './dedupe/TextSimilarity.js';
export * from './dedupe/DuplicateDetector.js';

// Numerology and prompts
export * from './numerology/NumerologyCalculator.js';
export * from './prompts/BankPromptTemplate.js';

// Generation
export * from './providers/index.js';
export * from './generation/BankGenerator.js';
export * from './generation/GenerationLogger.js';

// Export
export * from './export/ManifestBuilder.js';
export * from './export/RuntimeBundle.js';
export * from './export/CoverageReport.js';

// Catalog
export * from './catalog/InsightCatalog.js';
export * from './catalog/InsightSelector.js';
