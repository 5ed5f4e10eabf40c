// Document tree produced by the HTML loader and rewritten by each pipeline stage.
// Every node is readonly: stages build new trees instead of editing in place.

export interface StyleDescriptor {
  readonly fontFamily: string | null; // dominant (first) family, unquoted
  readonly bold: boolean;
  readonly italic: boolean;
  readonly monospace: boolean; // set by <code>, <pre>, <tt>, <kbd>, <samp>
}

/** Why a run was classified as code; null for prose. */
export type CodeOrigin = 'font' | 'backtick';

export interface TextRun {
  readonly kind: 'text';
  readonly text: string;
  readonly style: StyleDescriptor;
  readonly code: CodeOrigin | null;
}

export interface LineBreak {
  readonly kind: 'break';
}

export type LinkChild = TextRun | LineBreak;

export interface Link {
  readonly kind: 'link';
  readonly href: string;
  readonly children: readonly LinkChild[];
}

export type Inline = TextRun | LineBreak | Link;

export interface Paragraph {
  readonly kind: 'paragraph';
  readonly inlines: readonly Inline[];
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface Heading {
  readonly kind: 'heading';
  readonly level: HeadingLevel;
  readonly inlines: readonly Inline[];
}

export interface ListItem {
  readonly depth: number; // 0 for top-level items
  readonly ordered: boolean;
  readonly inlines: readonly Inline[];
}

export interface ListBlock {
  readonly kind: 'list';
  readonly items: readonly ListItem[];
}

export interface TableCell {
  readonly blocks: readonly Block[];
}

export interface TableRow {
  readonly header: boolean; // explicitly marked (<thead> or all <th>)
  readonly cells: readonly TableCell[];
}

export interface Table {
  readonly kind: 'table';
  readonly rows: readonly TableRow[];
}

export interface CodeBlock {
  readonly kind: 'code';
  readonly text: string;
  readonly language: string | null;
  readonly start: number; // index of the first merged paragraph
  readonly end: number; // index of the last merged paragraph (inclusive)
}

export interface ThematicBreak {
  readonly kind: 'rule';
}

export type Block = Paragraph | Heading | ListBlock | Table | CodeBlock | ThematicBreak;

export interface DocumentTree {
  readonly blocks: readonly Block[];
}

export type CaveatKind = 'language-unknown' | 'header-synthesized';

/**
 * A heuristic decision the converter could not make with certainty.
 * Caveats are reported to the user but never fail a conversion.
 */
export interface Caveat {
  kind: CaveatKind;
  message: string;
}

export const PLAIN_STYLE: StyleDescriptor = {
  fontFamily: null,
  bold: false,
  italic: false,
  monospace: false,
};

export function textRun(text: string, style: StyleDescriptor = PLAIN_STYLE): TextRun {
  return { kind: 'text', text, style, code: null };
}

/**
 * Applies `fn` to every inline sequence of a block, including the ones nested
 * in list items and table cells.
 */
export function mapBlockInlines(block: Block, fn: (inlines: readonly Inline[]) => readonly Inline[]): Block {
  switch (block.kind) {
    case 'paragraph':
    case 'heading':
      return { ...block, inlines: fn(block.inlines) };
    case 'list':
      return { ...block, items: block.items.map(item => ({ ...item, inlines: fn(item.inlines) })) };
    case 'table':
      return {
        ...block,
        rows: block.rows.map(row => ({
          ...row,
          cells: row.cells.map(cell => ({ blocks: cell.blocks.map(inner => mapBlockInlines(inner, fn)) })),
        })),
      };
    case 'code':
    case 'rule':
      return block;
  }
}

/** True when a paragraph carries no visible text and no link. */
export function isBlankParagraph(block: Block): boolean {
  if (block.kind !== 'paragraph') return false;
  return block.inlines.every(inline => inline.kind !== 'link' && (inline.kind === 'break' || inline.text.trim() === ''));
}
