/**
 * Inline formatting: text runs to Markdown emphasis, code spans and links.
 */

import type { Inline, TextRun } from '../models/document.js';

export interface InlineFormatOptions {
  /** `hard` renders `<br>` as a Markdown hard break, `space` as a plain space. */
  lineBreak: 'hard' | 'space';
  /** Drop bold markers (headings are already strong). */
  suppressBold: boolean;
}

const DEFAULT_OPTIONS: InlineFormatOptions = {
  lineBreak: 'hard',
  suppressBold: false,
};

const WORD_CHAR = /[\p{L}\p{N}]/u;

/**
 * Escapes prose so Markdown reads it literally. Underscores inside words are
 * left alone; GFM never treats them as emphasis.
 */
export function escapeText(text: string): string {
  return text
    .replace(/[\\`*[\]]/g, '\\$&')
    .replace(/<(?=[A-Za-z/!?])/g, '\\<')
    .replace(/&(?=#?[A-Za-z0-9]+;)/g, '\\&')
    .replace(/_/g, (underscore: string, offset: number, whole: string) =>
      WORD_CHAR.test(whole.charAt(offset - 1)) && WORD_CHAR.test(whole.charAt(offset + 1)) ? underscore : '\\_'
    );
}

/** Wraps `text` in a backtick fence longer than any backtick run inside it. */
export function codeSpan(text: string): string {
  const content = text.replace(/\r?\n/g, ' ');
  const longest = Math.max(0, ...(content.match(/`+/g) ?? []).map(run => run.length));
  const fence = '`'.repeat(longest + 1);
  const pad =
    content.startsWith('`') ||
    content.endsWith('`') ||
    (content.startsWith(' ') && content.endsWith(' ') && content.trim() !== '')
      ? ' '
      : '';
  return `${fence}${pad}${content}${pad}${fence}`;
}

export function formatHref(href: string): string {
  if (/[\s()<>]/.test(href)) {
    return `<${href.replace(/</g, '%3C').replace(/>/g, '%3E')}>`;
  }
  return href;
}

interface Emphasis {
  marker: string;
  open: string;
  close: string;
}

const BOLD: Emphasis = { marker: '**', open: '<strong>', close: '</strong>' };
const ITALIC: Emphasis = { marker: '*', open: '<em>', close: '</em>' };
const BOLD_ITALIC: Emphasis = { marker: '***', open: '<strong><em>', close: '</em></strong>' };

const PUNCTUATION = /[\p{P}\p{S}]/u;
const WHITESPACE = /\s/u;

/** `''` stands for the edge of the line. */
function isWordChar(char: string): boolean {
  return char !== '' && !WHITESPACE.test(char) && !PUNCTUATION.test(char);
}

function firstChar(text: string): string {
  const match = /^[\s\S]/u.exec(text);
  return match ? match[0] : '';
}

function lastChar(text: string): string {
  const match = /[\s\S]$/u.exec(text);
  return match ? match[0] : '';
}

/**
 * Delimiter runs only open or close emphasis when they flank the text
 * (CommonMark 6.2). A marker touching another marker would merge into one
 * run, so that counts as a failure too.
 */
function canOpen(before: string, first: string): boolean {
  return before !== '*' && !(PUNCTUATION.test(first) && isWordChar(before));
}

function canClose(last: string, after: string): boolean {
  return after !== '*' && !(PUNCTUATION.test(last) && isWordChar(after));
}

/**
 * Wraps the non-blank core of rendered `content`, leaving edge whitespace
 * outside. Falls back to inline HTML where Markdown markers would not flank.
 */
function wrapEmphasis(content: string, emphasis: Emphasis, before: string, after: string): string {
  const match = /^(\s*)([\s\S]*?)(\s*)$/.exec(content);
  if (!match || match[2] === '') return content;
  const [, lead, core, trail] = match;

  const left = lead === '' ? before : ' ';
  const right = trail === '' ? after : ' ';
  if (canOpen(left, firstChar(core)) && canClose(lastChar(core), right)) {
    return `${lead}${emphasis.marker}${core}${emphasis.marker}${trail}`;
  }
  return `${lead}${emphasis.open}${core}${emphasis.close}${trail}`;
}

type Piece =
  | { kind: 'literal'; text: string }
  | { kind: 'styled'; text: string; bold: boolean; italic: boolean };

type StyledPiece = Extract<Piece, { kind: 'styled' }>;

function isEmphasized(piece: Piece): piece is StyledPiece {
  return piece.kind === 'styled' && (piece.bold || piece.italic);
}

function renderPlain(piece: Piece): string {
  return piece.kind === 'literal' ? piece.text : escapeText(piece.text);
}

function emphasisOf(piece: StyledPiece): Emphasis {
  if (piece.bold && piece.italic) return BOLD_ITALIC;
  return piece.bold ? BOLD : ITALIC;
}

/**
 * Renders a stretch of adjacent emphasized pieces. A style every piece shares
 * becomes the outer span and the rest nests inside it, so
 * `<b>foo</b><b><i>bar</i></b>` reads `**foo*bar***`.
 */
function renderStretch(stretch: readonly StyledPiece[], before: string, after: string): string {
  if (stretch.length === 1) {
    return wrapEmphasis(escapeText(stretch[0].text), emphasisOf(stretch[0]), before, after);
  }

  const allBold = stretch.every(piece => piece.bold);
  const allItalic = stretch.every(piece => piece.italic);
  if (allBold || allItalic) {
    const inner = stretch.map(piece => ({ ...piece, bold: allBold ? false : piece.bold, italic: allBold ? piece.italic : false }));
    return wrapEmphasis(renderPieces(inner, '', ''), allBold ? BOLD : ITALIC, before, after);
  }

  // No shared style: each piece stands alone, next to another marker.
  let out = '';
  stretch.forEach((piece, index) => {
    const left = out === '' ? before : lastChar(out);
    const right = index === stretch.length - 1 ? after : '*';
    out += wrapEmphasis(escapeText(piece.text), emphasisOf(piece), left, right);
  });
  return out;
}

function renderPieces(pieces: readonly Piece[], before: string, after: string): string {
  let out = '';
  let index = 0;

  while (index < pieces.length) {
    const piece = pieces[index];
    if (!isEmphasized(piece)) {
      out += renderPlain(piece);
      index++;
      continue;
    }

    const stretch: StyledPiece[] = [];
    let end = index;
    while (end < pieces.length) {
      const next = pieces[end];
      if (!isEmphasized(next)) break;
      stretch.push(next);
      end++;
    }
    const left = out === '' ? before : lastChar(out);
    const right = end < pieces.length ? firstChar(renderPlain(pieces[end])) : after;
    out += renderStretch(stretch, left, right);
    index = end;
  }

  return out;
}

interface RunGroup {
  key: string;
  runs: TextRun[];
}

function groupKey(run: TextRun, options: InlineFormatOptions): string {
  if (run.code !== null) return 'code';
  const bold = run.style.bold && !options.suppressBold;
  return `${bold ? 'b' : ''}${run.style.italic ? 'i' : ''}`;
}

function groupPiece(group: RunGroup, options: InlineFormatOptions): Piece | null {
  const text = group.runs.map(run => run.text).join('');
  if (text === '') return null;

  if (group.key === 'code') {
    // Code wins over emphasis: markers never go inside a code span.
    return { kind: 'literal', text: text.trim() === '' ? text : codeSpan(text) };
  }

  const first = group.runs[0];
  return { kind: 'styled', text, bold: first.style.bold && !options.suppressBold, italic: first.style.italic };
}

function stripEdgeBreaks(inlines: readonly Inline[]): readonly Inline[] {
  let start = 0;
  let end = inlines.length;
  while (start < end && inlines[start].kind === 'break') start++;
  while (end > start && inlines[end - 1].kind === 'break') end--;
  return inlines.slice(start, end);
}

/**
 * Renders an inline sequence as Markdown.
 *
 * Consecutive runs with the same formatting are rendered as one group, so
 * `<b>foo</b><b>bar</b>` becomes `**foobar**`. Bold and italic nest as
 * `***text***`; code takes precedence and suppresses both. Emphasis that
 * Markdown markers cannot express in place, such as `**Note:**` directly
 * before a letter, is written as `<strong>`/`<em>`.
 */
export function formatInlines(inlines: readonly Inline[], options: Partial<InlineFormatOptions> = {}): string {
  const opts: InlineFormatOptions = { ...DEFAULT_OPTIONS, ...options };
  const pieces: Piece[] = [];
  const current: { group: RunGroup | null } = { group: null };

  const flush = () => {
    const piece = current.group ? groupPiece(current.group, opts) : null;
    if (piece) pieces.push(piece);
    current.group = null;
  };

  for (const inline of stripEdgeBreaks(inlines)) {
    if (inline.kind === 'text') {
      if (inline.text === '') continue;
      const key = groupKey(inline, opts);
      if (current.group !== null && current.group.key === key) {
        current.group.runs.push(inline);
      } else {
        flush();
        current.group = { key, runs: [inline] };
      }
      continue;
    }

    flush();
    if (inline.kind === 'break') {
      pieces.push({ kind: 'literal', text: opts.lineBreak === 'hard' ? '\\\n' : ' ' });
    } else {
      const label = formatInlines(inline.children, { ...opts, lineBreak: 'space' });
      if (label.trim() !== '') {
        pieces.push({ kind: 'literal', text: `[${label}](${formatHref(inline.href)})` });
      }
    }
  }
  flush();

  return renderPieces(pieces, '', '');
}
