/**
 * HTML loader: turns an exported HTML document into a {@link DocumentTree}.
 */

import { parse, HTMLElement, TextNode, type Node } from 'node-html-parser';
import {
  PLAIN_STYLE,
  textRun,
  type Block,
  type DocumentTree,
  type HeadingLevel,
  type Inline,
  type LinkChild,
  type ListBlock,
  type ListItem,
  type Table,
  type TableCell,
  type TableRow,
  type TextRun,
  type StyleDescriptor,
} from '../models/document.js';
import { describeCause, ParseError } from '../core/errors.js';
import { logger } from '../util/logger.js';
import { parseDeclarations, resolveStyle, StyleSheet, type Declarations } from './styleResolver.js';

const DROPPED_TAGS = new Set([
  'head', 'title', 'meta', 'link', 'style', 'script', 'noscript', 'img', 'svg', 'iframe', 'object', 'embed',
]);

const CONTAINER_TAGS = new Set([
  'html', 'body', 'div', 'section', 'article', 'main', 'header', 'footer', 'nav', 'aside',
  'blockquote', 'center', 'form', 'figure', 'dl', 'dd', 'dt',
]);

const HEADING_TAGS = new Map<string, HeadingLevel>([
  ['h1', 1], ['h2', 2], ['h3', 3], ['h4', 4], ['h5', 5], ['h6', 6],
]);

// Google Docs encodes list nesting in class names such as `lst-kix_ab12cd-1`.
const LIST_LEVEL_CLASS = /^lst-kix_\w+-(\d+)$/;

function tagOf(element: HTMLElement): string {
  return element.rawTagName ? element.rawTagName.toLowerCase() : '';
}

function classesOf(element: HTMLElement): string[] {
  return (element.getAttribute('class') ?? '').split(/\s+/).filter(Boolean);
}

function isListTag(tag: string): boolean {
  return tag === 'ul' || tag === 'ol';
}

function isBlockTag(tag: string): boolean {
  return tag === 'p' || tag === 'pre' || tag === 'table' || HEADING_TAGS.has(tag) || CONTAINER_TAGS.has(tag);
}

/**
 * Collapses whitespace the way a browser lays out a line: one space between
 * words, none at the start or end of a line (around `<br>` too).
 */
function normalizeWhitespace(inlines: readonly Inline[]): Inline[] {
  const texts: string[] = [];
  const kinds: Array<'text' | 'break'> = [];

  const visit = (nodes: readonly Inline[]) => {
    for (const node of nodes) {
      if (node.kind === 'link') {
        visit(node.children);
      } else if (node.kind === 'text') {
        texts.push(node.text.replace(/[ \t\r\n\f]+/g, ' '));
        kinds.push('text');
      } else {
        texts.push('');
        kinds.push('break');
      }
    }
  };
  visit(inlines);

  let atLineStart = true;
  let lastText = -1;
  const trimLast = () => {
    if (lastText >= 0) texts[lastText] = texts[lastText].replace(/ +$/, '');
  };

  for (let i = 0; i < texts.length; i++) {
    if (kinds[i] === 'break') {
      trimLast();
      atLineStart = true;
      lastText = -1;
      continue;
    }
    const previousEndsWithSpace = lastText >= 0 && texts[lastText].endsWith(' ');
    if (atLineStart || previousEndsWithSpace) {
      texts[i] = texts[i].replace(/^ +/, '');
    }
    if (texts[i] !== '') {
      atLineStart = false;
      lastText = i;
    }
  }
  trimLast();

  let cursor = 0;
  const adjust = (run: TextRun): TextRun[] => {
    const text = texts[cursor++];
    return text === '' ? [] : [{ ...run, text }];
  };
  const rebuildChildren = (nodes: readonly LinkChild[]): LinkChild[] =>
    nodes.flatMap((node): LinkChild[] => {
      if (node.kind === 'text') return adjust(node);
      cursor++;
      return [node];
    });

  return inlines.flatMap((node): Inline[] => {
    if (node.kind === 'link') return [{ ...node, children: rebuildChildren(node.children) }];
    if (node.kind === 'text') return adjust(node);
    cursor++;
    return [node];
  });
}

/** Drops a single newline directly after `<pre>` and before `</pre>`. */
function trimPreformatted(inlines: Inline[]): Inline[] {
  const result = [...inlines];
  const first = result[0];
  if (first?.kind === 'text') {
    result[0] = { ...first, text: first.text.replace(/^\r?\n/, '') };
  }
  const lastIndex = result.length - 1;
  const last = result[lastIndex];
  if (last?.kind === 'text') {
    result[lastIndex] = { ...last, text: last.text.replace(/\r?\n$/, '') };
  }
  return result.filter(inline => inline.kind !== 'text' || inline.text !== '');
}

function hasText(inlines: readonly Inline[]): boolean {
  return inlines.some(inline => inline.kind !== 'break');
}

export class HtmlLoader {
  /**
   * Parses `html` into a document tree.
   *
   * @param sourcePath - used in error messages only
   * @throws {ParseError} when the input is empty or contains no HTML elements
   */
  load(html: string, sourcePath = '<input>'): DocumentTree {
    if (html.trim() === '') {
      throw new ParseError(sourcePath, 'input is empty');
    }

    let root: HTMLElement;
    try {
      root = parse(html, {
        lowerCaseTagName: false,
        comment: false,
        blockTextElements: { script: true, noscript: true, style: true },
      });
    } catch (error) {
      throw new ParseError(sourcePath, describeCause(error), { cause: error });
    }

    if (!root.childNodes.some(node => node instanceof HTMLElement)) {
      throw new ParseError(sourcePath, 'no HTML elements found');
    }

    const sheet = StyleSheet.fromCss(root.querySelectorAll('style').map(style => style.text));
    const body = root.querySelector('body') ?? root;
    const reader = new DocumentReader(sheet);
    const blocks = reader.readBlocks(body, body === root ? PLAIN_STYLE : reader.styleOf(body, PLAIN_STYLE));

    logger.debug('Loaded HTML document', { path: sourcePath, blocks: blocks.length, classRules: sheet.size });
    return { blocks };
  }
}

/** Walks one parsed document; holds only the stylesheet. */
class DocumentReader {
  constructor(private readonly sheet: StyleSheet) {}

  styleOf(element: HTMLElement, parent: StyleDescriptor): StyleDescriptor {
    const declarationSets: Declarations[] = this.sheet.declarationsFor(classesOf(element));
    const inline = element.getAttribute('style');
    if (inline) {
      declarationSets.push(parseDeclarations(inline));
    }
    return resolveStyle(parent, tagOf(element), declarationSets);
  }

  readBlocks(container: HTMLElement, style: StyleDescriptor): Block[] {
    const blocks: Block[] = [];
    let pending: Node[] = [];

    const flush = () => {
      if (pending.length === 0) return;
      const inlines = normalizeWhitespace(this.readInlines(pending, style));
      if (hasText(inlines)) {
        blocks.push({ kind: 'paragraph', inlines });
      }
      pending = [];
    };

    for (const node of container.childNodes) {
      if (!(node instanceof HTMLElement)) {
        if (node instanceof TextNode) pending.push(node);
        continue;
      }

      const tag = tagOf(node);
      if (DROPPED_TAGS.has(tag)) continue;

      const block = this.readBlock(node, tag, style);
      if (block === undefined) {
        pending.push(node);
        continue;
      }

      flush();
      blocks.push(...block);
    }
    flush();

    return mergeAdjacentLists(blocks);
  }

  /** Block(s) for a block-level element, `undefined` for inline content. */
  private readBlock(element: HTMLElement, tag: string, parentStyle: StyleDescriptor): Block[] | undefined {
    const style = this.styleOf(element, parentStyle);

    if (tag === 'p') {
      return [{ kind: 'paragraph', inlines: normalizeWhitespace(this.readInlines(element.childNodes, style)) }];
    }

    const level = HEADING_TAGS.get(tag);
    if (level !== undefined) {
      const inlines = normalizeWhitespace(this.readInlines(element.childNodes, style));
      return [{ kind: 'heading', level, inlines }];
    }

    if (tag === 'pre') {
      return [{ kind: 'paragraph', inlines: trimPreformatted(this.readInlines(element.childNodes, style)) }];
    }

    if (isListTag(tag)) {
      const items: ListItem[] = [];
      this.readList(element, parentStyle, 0, items);
      return items.length > 0 ? [{ kind: 'list', items }] : [];
    }

    if (tag === 'table') {
      return [this.readTable(element, style)];
    }

    if (tag === 'hr') {
      return [{ kind: 'rule' }];
    }

    if (CONTAINER_TAGS.has(tag)) {
      return this.readBlocks(element, style);
    }

    return undefined;
  }

  private readList(list: HTMLElement, parentStyle: StyleDescriptor, depth: number, items: ListItem[]): void {
    const ordered = tagOf(list) === 'ol';
    const style = this.styleOf(list, parentStyle);

    let level = depth;
    if (depth === 0) {
      for (const className of classesOf(list)) {
        const match = LIST_LEVEL_CLASS.exec(className);
        if (match) level = Number(match[1]);
      }
    }

    for (const child of list.childNodes) {
      if (!(child instanceof HTMLElement)) continue;
      const tag = tagOf(child);

      if (isListTag(tag)) {
        this.readList(child, style, level + 1, items);
        continue;
      }
      if (tag !== 'li') continue;

      const itemStyle = this.styleOf(child, style);
      const nested = child.childNodes.filter(
        (node): node is HTMLElement => node instanceof HTMLElement && isListTag(tagOf(node))
      );
      const content = child.childNodes.filter(node => !nested.some(list => list === node));
      const inlines = normalizeWhitespace(this.readItemInlines(content, itemStyle));

      if (hasText(inlines)) {
        items.push({ depth: level, ordered, inlines });
      }
      for (const nestedList of nested) {
        this.readList(nestedList, itemStyle, level + 1, items);
      }
    }
  }

  private readTable(table: HTMLElement, style: StyleDescriptor): Table {
    const rows: TableRow[] = [];

    const visitRows = (element: HTMLElement, inHead: boolean, inheritedStyle: StyleDescriptor) => {
      for (const child of element.childNodes) {
        if (!(child instanceof HTMLElement)) continue;
        const tag = tagOf(child);
        const childStyle = this.styleOf(child, inheritedStyle);

        if (tag === 'thead' || tag === 'tbody' || tag === 'tfoot') {
          visitRows(child, tag === 'thead', childStyle);
        } else if (tag === 'tr') {
          rows.push(this.readRow(child, inHead, childStyle));
        }
      }
    };
    visitRows(table, false, style);

    return { kind: 'table', rows };
  }

  private readRow(row: HTMLElement, inHead: boolean, style: StyleDescriptor): TableRow {
    const cells: TableCell[] = [];
    let allHeaderCells = true;

    for (const child of row.childNodes) {
      if (!(child instanceof HTMLElement)) continue;
      const tag = tagOf(child);
      if (tag !== 'td' && tag !== 'th') continue;

      if (tag === 'td') allHeaderCells = false;
      cells.push({ blocks: this.readBlocks(child, this.styleOf(child, style)) });
    }

    return { header: inHead || (cells.length > 0 && allHeaderCells), cells };
  }

  /** List item content; block children are separated by a space, as a browser lays them out. */
  private readItemInlines(nodes: readonly Node[], style: StyleDescriptor): Inline[] {
    const inlines: Inline[] = [];
    for (const node of nodes) {
      const separate = node instanceof HTMLElement && isBlockTag(tagOf(node)) && inlines.length > 0;
      if (separate) inlines.push(textRun(' ', style));
      inlines.push(...this.readInlines([node], style));
    }
    return inlines;
  }

  readInlines(nodes: readonly Node[], style: StyleDescriptor): Inline[] {
    const inlines: Inline[] = [];

    for (const node of nodes) {
      if (node instanceof TextNode) {
        const text = node.text;
        if (text !== '') inlines.push(textRun(text, style));
        continue;
      }
      if (!(node instanceof HTMLElement)) continue;

      const tag = tagOf(node);
      if (DROPPED_TAGS.has(tag)) continue;
      if (tag === 'br') {
        inlines.push({ kind: 'break' });
        continue;
      }

      const childStyle = this.styleOf(node, style);
      const children = this.readInlines(node.childNodes, childStyle);
      const href = tag === 'a' ? node.getAttribute('href') : undefined;

      if (href) {
        inlines.push({ kind: 'link', href, children: flattenLinkChildren(children) });
      } else {
        inlines.push(...children);
      }
    }

    return inlines;
  }
}

/** Links cannot nest; an inner link keeps its text and loses its target. */
function flattenLinkChildren(inlines: readonly Inline[]): LinkChild[] {
  return inlines.flatMap(inline => (inline.kind === 'link' ? [...inline.children] : [inline]));
}

/**
 * Exporters emit a separate list element every time the nesting level
 * changes; consecutive lists belong to the same Markdown list.
 */
function mergeAdjacentLists(blocks: Block[]): Block[] {
  const result: Block[] = [];
  for (const block of blocks) {
    const previous = result[result.length - 1];
    if (block.kind === 'list' && previous?.kind === 'list') {
      const merged: ListBlock = { kind: 'list', items: [...previous.items, ...block.items] };
      result[result.length - 1] = merged;
    } else {
      result.push(block);
    }
  }
  return result;
}
