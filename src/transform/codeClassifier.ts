/**
 * Code classification.
 *
 * Runs are tagged as code when they are set in a monospace font or written
 * between backticks. Classification works per run, so one paragraph can mix
 * code and prose; whole-paragraph decisions are derived from the runs.
 *
 * Language inference is a best-effort heuristic: a handful of keyword and
 * layout signatures per language. It is allowed to be wrong, and anything it
 * does not recognise is left untagged.
 */

import {
  mapBlockInlines,
  type Block,
  type DocumentTree,
  type Inline,
  type LinkChild,
  type TextRun,
} from '../models/document.js';
import { DEFAULT_CODE_FONTS, PYTHON_RULE, type LanguageRule } from '../models/options.js';
import { logger } from '../util/logger.js';

export function normalizeFontName(name: string): string {
  return name.trim().replace(/^['"]|['"]$/g, '').trim().toLowerCase();
}

export interface CodeClassifierOptions {
  codeFonts: readonly string[];
  languageRules: readonly LanguageRule[];
}

export class CodeClassifier {
  private readonly codeFonts: Set<string>;
  private readonly languageRules: readonly LanguageRule[];

  constructor(options: Partial<CodeClassifierOptions> = {}) {
    this.codeFonts = new Set((options.codeFonts ?? DEFAULT_CODE_FONTS).map(normalizeFontName));
    this.languageRules = options.languageRules ?? [PYTHON_RULE];
  }

  isCodeFont(fontFamily: string | null): boolean {
    return fontFamily !== null && this.codeFonts.has(normalizeFontName(fontFamily));
  }

  classify(document: DocumentTree): DocumentTree {
    const blocks = document.blocks.map(block => mapBlockInlines(block, inlines => this.classifyInlines(inlines)));
    logger.debug('Classified code runs', {
      codeParagraphs: blocks.filter(isCodeParagraph).length,
    });
    return { blocks };
  }

  classifyInlines(inlines: readonly Inline[]): Inline[] {
    return inlines.flatMap((inline): Inline[] => {
      if (inline.kind === 'link') {
        return [{ ...inline, children: inline.children.flatMap(child => this.classifyChild(child)) }];
      }
      return this.classifyChild(inline);
    });
  }

  private classifyChild(child: LinkChild): LinkChild[] {
    if (child.kind !== 'text') return [child];
    if (child.style.monospace || this.isCodeFont(child.style.fontFamily)) {
      return [{ ...child, code: 'font' }];
    }
    return splitBackticks(child);
  }

  /**
   * Guesses the language of a code snippet; `null` when no rule matches.
   */
  inferLanguage(code: string): string | null {
    for (const rule of this.languageRules) {
      if (rule.patterns.some(pattern => pattern.test(code))) {
        return rule.language;
      }
    }
    return null;
  }
}

/**
 * Splits `` a `b` c `` into prose "a ", code "b", prose " c". An unmatched
 * backtick stays in the prose.
 */
export function splitBackticks(run: TextRun): TextRun[] {
  if (run.code !== null || !run.text.includes('`')) return [run];

  const parts: TextRun[] = [];
  let last = 0;
  for (const match of run.text.matchAll(/`([^`]+)`/g)) {
    const index = match.index ?? 0;
    if (index > last) parts.push({ ...run, text: run.text.slice(last, index) });
    parts.push({ ...run, text: match[1], code: 'backtick' });
    last = index + match[0].length;
  }
  if (last < run.text.length) parts.push({ ...run, text: run.text.slice(last) });

  return parts;
}

/**
 * A paragraph that is code through and through: it has visible text, and
 * every inline is a code run or a line break. Links disqualify it.
 */
export function isCodeParagraph(block: Block): boolean {
  if (block.kind !== 'paragraph') return false;
  let visible = false;
  for (const inline of block.inlines) {
    if (inline.kind === 'break') continue;
    if (inline.kind === 'link' || inline.code === null) return false;
    if (inline.text.trim() !== '') visible = true;
  }
  return visible;
}
