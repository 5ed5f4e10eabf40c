import {
  isBlankParagraph,
  type Block,
  type Caveat,
  type CodeBlock,
  type DocumentTree,
  type Paragraph,
} from '../models/document.js';
import { logger } from '../util/logger.js';
import { CodeClassifier, isCodeParagraph } from './codeClassifier.js';

export interface MergeResult {
  document: DocumentTree;
  caveats: Caveat[];
}

/**
 * Text of a code paragraph: runs concatenated, `<br>` as a newline and
 * non-breaking spaces (how exporters keep indentation) as plain spaces.
 */
export function codeText(paragraph: Paragraph): string {
  return paragraph.inlines
    .map(inline => {
      switch (inline.kind) {
        case 'text':
          return inline.text;
        case 'break':
          return '\n';
        case 'link':
          return '';
      }
    })
    .join('')
    .replace(/\u00a0/g, ' ');
}

/**
 * Coalesces runs of code paragraphs into fenced code blocks.
 *
 * Blank paragraphs between two code paragraphs become empty lines inside the
 * block; blank paragraphs after the last one are left where they are. Only
 * top-level blocks are merged.
 */
export class CodeBlockMerger {
  constructor(private readonly classifier: CodeClassifier = new CodeClassifier()) {}

  merge(document: DocumentTree): MergeResult {
    const blocks = document.blocks;
    const merged: Block[] = [];
    const caveats: Caveat[] = [];

    let index = 0;
    while (index < blocks.length) {
      const block = blocks[index];
      if (block.kind !== 'paragraph' || !isCodeParagraph(block)) {
        merged.push(block);
        index++;
        continue;
      }

      const constituents: string[] = [codeText(block)];
      const lines: string[] = [constituents[0]];
      const start = index;
      let end = index;
      let blanks = 0;

      for (let next = index + 1; next < blocks.length; next++) {
        const candidate = blocks[next];
        if (isBlankParagraph(candidate)) {
          blanks++;
          continue;
        }
        if (candidate.kind !== 'paragraph' || !isCodeParagraph(candidate)) break;

        const text = codeText(candidate);
        lines.push(...Array<string>(blanks).fill(''), text);
        constituents.push(text);
        blanks = 0;
        end = next;
      }

      const codeBlock = this.buildBlock(lines.join('\n'), constituents, start, end);
      if (codeBlock.language === null) {
        caveats.push({
          kind: 'language-unknown',
          message: `No language detected for code block starting "${firstLine(codeBlock.text)}"`,
        });
      }
      merged.push(codeBlock);
      index = end + 1;
    }

    logger.debug('Merged code paragraphs', {
      before: blocks.length,
      after: merged.length,
      codeBlocks: merged.filter(block => block.kind === 'code').length,
    });

    return { document: { blocks: merged }, caveats };
  }

  private buildBlock(text: string, constituents: readonly string[], start: number, end: number): CodeBlock {
    let language: string | null = null;
    for (const paragraph of constituents) {
      language = this.classifier.inferLanguage(paragraph);
      if (language !== null) break;
    }
    return { kind: 'code', text, language, start, end };
  }
}

function firstLine(text: string): string {
  const line = (text.split('\n').find(candidate => candidate.trim() !== '') ?? '').trim();
  return line.length > 40 ? `${line.slice(0, 40)}…` : line;
}
