import type { Block, Caveat, CodeBlock, DocumentTree, ListBlock } from '../models/document.js';
import { logger } from '../util/logger.js';
import { formatInlines } from './inlineFormatter.js';
import type { MarkdownFormatter } from './markdownFormatter.js';
import { TableRenderer } from './tableRenderer.js';

export interface EmitResult {
  markdown: string;
  caveats: Caveat[];
}

/**
 * Escapes a line of prose that Markdown would otherwise read as the start of
 * a heading, quote, list, rule or tilde fence.
 */
export function escapeBlockStart(line: string): string {
  const ordered = /^(\d{1,9})([.)])(\s|$)/.exec(line);
  if (ordered) {
    return `${ordered[1]}\\${line.slice(ordered[1].length)}`;
  }
  if (/^(#{1,6}(\s|$)|>|[-+](\s|$)|-{3,}\s*$|~{3,})/.test(line)) {
    return `\\${line}`;
  }
  return line;
}

export function codeFence(block: CodeBlock): string {
  const longest = Math.max(0, ...(block.text.match(/`+/g) ?? []).map(run => run.length));
  const fence = '`'.repeat(Math.max(3, longest + 1));
  return `${fence}${block.language ?? ''}\n${block.text}\n${fence}`;
}

function renderProse(text: string): string {
  return text.split('\n').map(escapeBlockStart).join('\n');
}

function renderList(list: ListBlock): string | null {
  const lines: string[] = [];
  const contentColumns: number[] = [];

  for (const item of list.items) {
    const text = formatInlines(item.inlines, { lineBreak: 'space' }).trim();
    if (text === '') continue;

    // A level can only be one deeper than the deepest open one.
    const depth = Math.min(item.depth, contentColumns.length);
    const indent = depth === 0 ? 0 : contentColumns[depth - 1];
    const marker = item.ordered ? '1. ' : '- ';
    contentColumns.length = depth;
    contentColumns.push(indent + marker.length);

    lines.push(`${' '.repeat(indent)}${marker}${escapeBlockStart(text)}`);
  }

  return lines.length > 0 ? lines.join('\n') : null;
}

/**
 * Serializes a transformed document to Markdown and hands the result to the
 * formatter, when one is configured.
 */
export class MarkdownEmitter {
  constructor(
    private readonly formatter: MarkdownFormatter | null = null,
    private readonly tables: TableRenderer = new TableRenderer()
  ) {}

  serialize(document: DocumentTree): EmitResult {
    const caveats: Caveat[] = [];
    const chunks: string[] = [];
    let tableIndex = 0;

    const renderBlock = (block: Block): string | null => {
      switch (block.kind) {
        case 'paragraph': {
          const text = formatInlines(block.inlines).trim();
          return text === '' ? null : renderProse(text);
        }
        case 'heading': {
          const text = formatInlines(block.inlines, { lineBreak: 'space', suppressBold: true }).trim();
          return text === '' ? null : `${'#'.repeat(block.level)} ${text}`;
        }
        case 'list':
          return renderList(block);
        case 'code':
          return codeFence(block);
        case 'table': {
          tableIndex++;
          const { markdown, synthesizedHeader } = this.tables.render(block);
          if (synthesizedHeader) {
            caveats.push({
              kind: 'header-synthesized',
              message: `Table ${tableIndex} has no header row; an empty header row was inserted`,
            });
          }
          return markdown === '' ? null : markdown;
        }
        case 'rule':
          return '---';
      }
    };

    for (const block of document.blocks) {
      const chunk = renderBlock(block);
      if (chunk !== null) chunks.push(chunk);
    }

    return { markdown: chunks.length > 0 ? `${chunks.join('\n\n')}\n` : '', caveats };
  }

  async emit(document: DocumentTree): Promise<EmitResult> {
    const result = this.serialize(document);
    if (!this.formatter) {
      return result;
    }

    logger.debug('Formatting Markdown', { formatter: this.formatter.name, length: result.markdown.length });
    const markdown = await this.formatter.format(result.markdown);
    return { ...result, markdown };
  }
}
