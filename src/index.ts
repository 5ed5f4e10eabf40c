/**
 * Library surface: convert exported HTML documents to Markdown.
 */

export { DocumentConverter, convertHtml } from './core/converter.js';
export type { ConverterOptions, ConversionResult, ConversionStats } from './core/converter.js';
export { Doc2MdError, ParseError, IOError, ConfigError } from './core/errors.js';
export type { Doc2MdErrorCode, IOOperation } from './core/errors.js';
export { EXIT_CODES, evaluateExitStatus, exitCodeFor } from './core/exitStatus.js';
export type { ExitCode, ExitStatusResult } from './core/exitStatus.js';

export { HtmlLoader } from './transform/htmlLoader.js';
export { LinkRewriter } from './transform/linkRewriter.js';
export { CodeClassifier } from './transform/codeClassifier.js';
export { CodeBlockMerger } from './transform/codeBlockMerger.js';
export { MarkdownEmitter } from './transform/markdownEmitter.js';
export { TableRenderer, normalizeTable, unwrapSingleCellTables } from './transform/tableRenderer.js';
export { formatInlines } from './transform/inlineFormatter.js';
export { PrettierFormatter } from './transform/markdownFormatter.js';
export type { MarkdownFormatter } from './transform/markdownFormatter.js';
export { StyleSheet, resolveStyle } from './transform/styleResolver.js';

export * from './models/document.js';
export * from './models/options.js';

export { Logger, logger } from './util/logger.js';
export type { LogLevel, LogFormat } from './util/logger.js';
