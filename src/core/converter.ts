/**
 * Conversion pipeline: exported HTML in, Markdown out.
 */

import type { Caveat, DocumentTree } from '../models/document.js';
import { defaultConversionOptions, type ConversionOptions } from '../models/options.js';
import { CodeBlockMerger } from '../transform/codeBlockMerger.js';
import { CodeClassifier } from '../transform/codeClassifier.js';
import { HtmlLoader } from '../transform/htmlLoader.js';
import { LinkRewriter } from '../transform/linkRewriter.js';
import { MarkdownEmitter } from '../transform/markdownEmitter.js';
import { PrettierFormatter, type MarkdownFormatter } from '../transform/markdownFormatter.js';
import { unwrapSingleCellTables } from '../transform/tableRenderer.js';
import { logger } from '../util/logger.js';

export interface ConverterOptions extends Partial<ConversionOptions> {
  /** `null` skips the formatting pass; defaults to prettier. */
  formatter?: MarkdownFormatter | null;
}

export interface ConversionStats {
  blocks: number;
  codeBlocks: number;
  linksRewritten: number;
  tables: number;
}

export interface ConversionResult {
  markdown: string;
  caveats: Caveat[];
  stats: ConversionStats;
}

/**
 * Runs the pipeline stages in order. Each stage takes the previous stage's
 * tree and returns a new one; any stage failure aborts the whole conversion.
 */
export class DocumentConverter {
  private readonly loader = new HtmlLoader();
  private readonly linkRewriter: LinkRewriter;
  private readonly classifier: CodeClassifier;
  private readonly merger: CodeBlockMerger;
  private readonly emitter: MarkdownEmitter;
  private readonly unwrapTables: boolean;

  constructor(options: ConverterOptions = {}) {
    const settings: ConversionOptions = { ...defaultConversionOptions(), ...withoutUndefined(options) };
    const formatter = options.formatter === undefined ? new PrettierFormatter() : options.formatter;

    this.linkRewriter = new LinkRewriter(settings.trackingWrappers);
    this.classifier = new CodeClassifier({ codeFonts: settings.codeFonts, languageRules: settings.languageRules });
    this.merger = new CodeBlockMerger(this.classifier);
    this.emitter = new MarkdownEmitter(formatter);
    this.unwrapTables = settings.unwrapSingleCellTables;
  }

  async convert(html: string, sourcePath = '<input>'): Promise<ConversionResult> {
    logger.info('Parsing HTML', { path: sourcePath, length: html.length });
    let document: DocumentTree = this.loader.load(html, sourcePath);

    logger.info('Fixing tracking links');
    const links = this.linkRewriter.rewrite(document);
    document = links.document;

    if (this.unwrapTables) {
      logger.info('Unwrapping single-cell tables');
      document = unwrapSingleCellTables(document);
    }

    logger.info('Marking code');
    document = this.classifier.classify(document);

    logger.info('Merging code blocks');
    const merged = this.merger.merge(document);
    document = merged.document;

    logger.info('Writing Markdown');
    const emitted = await this.emitter.emit(document);

    const caveats = [...merged.caveats, ...emitted.caveats];
    for (const caveat of caveats) {
      logger.warn(caveat.message, { caveat: caveat.kind });
    }

    return {
      markdown: emitted.markdown,
      caveats,
      stats: {
        blocks: document.blocks.length,
        codeBlocks: document.blocks.filter(block => block.kind === 'code').length,
        linksRewritten: links.rewritten,
        tables: document.blocks.filter(block => block.kind === 'table').length,
      },
    };
  }
}

function withoutUndefined(options: ConverterOptions): Partial<ConversionOptions> {
  const result: Partial<ConversionOptions> = {};
  if (options.codeFonts !== undefined) result.codeFonts = options.codeFonts;
  if (options.trackingWrappers !== undefined) result.trackingWrappers = options.trackingWrappers;
  if (options.languageRules !== undefined) result.languageRules = options.languageRules;
  if (options.unwrapSingleCellTables !== undefined) result.unwrapSingleCellTables = options.unwrapSingleCellTables;
  return result;
}

/** Converts an HTML string to Markdown with the given options. */
export async function convertHtml(html: string, options: ConverterOptions = {}): Promise<string> {
  const result = await new DocumentConverter(options).convert(html);
  return result.markdown;
}
