import type { Block, DocumentTree, Table, TableCell, TableRow } from '../models/document.js';
import { codeSpan, formatInlines } from './inlineFormatter.js';

export interface TableRenderResult {
  markdown: string;
  synthesizedHeader: boolean;
}

const EMPTY_CELL: TableCell = { blocks: [] };

/**
 * Pads every row to the widest row and makes sure the first row is a header,
 * synthesizing an empty one when the source marked none.
 */
export function normalizeTable(table: Table): { table: Table; synthesizedHeader: boolean } {
  const width = Math.max(0, ...table.rows.map(row => row.cells.length));
  const pad = (row: TableRow): TableRow => ({
    ...row,
    cells: [...row.cells, ...Array<TableCell>(width - row.cells.length).fill(EMPTY_CELL)],
  });

  const rows = table.rows.map(pad);
  const synthesizedHeader = rows.length > 0 && !rows[0].header;
  if (synthesizedHeader) {
    rows.unshift({ header: true, cells: Array<TableCell>(width).fill(EMPTY_CELL) });
  }

  return { table: { ...table, rows }, synthesizedHeader };
}

/**
 * Tables made of a single cell are layout boxes (typically around a code
 * sample), not data; they are replaced by the cell's content.
 */
export function unwrapSingleCellTables(document: DocumentTree): DocumentTree {
  const unwrap = (blocks: readonly Block[]): Block[] =>
    blocks.flatMap((block): Block[] => {
      if (block.kind !== 'table') return [block];
      if (block.rows.length === 1 && block.rows[0].cells.length === 1) {
        return unwrap(block.rows[0].cells[0].blocks);
      }
      return [block];
    });

  return { blocks: unwrap(document.blocks) };
}

/** Escapes the column delimiter; GFM requires it even inside code spans. */
export function escapePipes(text: string): string {
  return text.replace(/\|/g, '\\|');
}

function cellBlockText(block: Block): string[] {
  const inline = { lineBreak: 'space', suppressBold: false } as const;
  switch (block.kind) {
    case 'paragraph':
    case 'heading':
      return [formatInlines(block.inlines, inline)];
    case 'list':
      return block.items.map(item => formatInlines(item.inlines, inline));
    case 'code':
      return [codeSpan(block.text)];
    case 'table':
      return block.rows.flatMap(row => row.cells.flatMap(cell => cell.blocks.flatMap(cellBlockText)));
    case 'rule':
      return [];
  }
}

export class TableRenderer {
  /** Markdown for one cell: its blocks inline-formatted, joined by spaces. */
  renderCell(cell: TableCell): string {
    const text = cell.blocks
      .flatMap(cellBlockText)
      .map(part => part.trim())
      .filter(part => part !== '')
      .join(' ');
    return escapePipes(text);
  }

  render(source: Table): TableRenderResult {
    const { table, synthesizedHeader } = normalizeTable(source);
    const width = table.rows[0]?.cells.length ?? 0;
    if (width === 0) {
      return { markdown: '', synthesizedHeader: false };
    }

    const line = (cells: readonly string[]) => `| ${cells.join(' | ')} |`;
    const [header, ...body] = table.rows;
    const lines = [
      line(header.cells.map(cell => this.renderCell(cell))),
      line(Array<string>(width).fill('---')),
      ...body.map(row => line(row.cells.map(cell => this.renderCell(cell)))),
    ];

    return { markdown: lines.join('\n'), synthesizedHeader };
  }
}
