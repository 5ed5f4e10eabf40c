/**
 * Style resolution for exported HTML.
 *
 * Word-processor exports carry formatting in a `<style>` block of generated
 * class rules (`.c3{font-family:"Courier New"}`) plus inline `style`
 * attributes. This module turns that cascade into a {@link StyleDescriptor},
 * once per element, with no further probing of attributes downstream.
 */

import type { StyleDescriptor } from '../models/document.js';

export type Declarations = ReadonlyMap<string, string>;

export interface ClassRule {
  className: string;
  declarations: Declarations;
}

const BOLD_TAGS = new Set(['b', 'strong']);
const ITALIC_TAGS = new Set(['i', 'em', 'cite', 'var']);
const MONOSPACE_TAGS = new Set(['code', 'pre', 'tt', 'kbd', 'samp']);

/**
 * Parses `prop: value; prop: value` into a map keyed by lower-cased property.
 * Later declarations win; `!important` is ignored.
 */
export function parseDeclarations(text: string): Declarations {
  const result = new Map<string, string>();

  for (const declaration of text.split(';')) {
    const colon = declaration.indexOf(':');
    if (colon === -1) continue;

    const property = declaration.slice(0, colon).trim().toLowerCase();
    const value = declaration.slice(colon + 1).replace(/!important/i, '').trim();
    if (property && value) {
      result.set(property, value);
    }
  }

  return result;
}

/**
 * Extracts single-class rules (`.c1 { ... }`, including grouped selectors such
 * as `.c1, .c2 { ... }`) in stylesheet order. Any other selector is skipped.
 */
export function parseStylesheet(css: string): ClassRule[] {
  const rules: ClassRule[] = [];
  const cleaned = css
    .replace(/\/\*[\s\S]*?\*\//g, '')
    .replace(/@import[^;]*;/gi, '');

  for (const match of cleaned.matchAll(/([^{}]+)\{([^{}]*)\}/g)) {
    const declarations = parseDeclarations(match[2]);
    if (declarations.size === 0) continue;

    for (const selector of match[1].split(',')) {
      const classMatch = /^\.([\w-]+)$/.exec(selector.trim());
      if (classMatch) {
        rules.push({ className: classMatch[1], declarations });
      }
    }
  }

  return rules;
}

export class StyleSheet {
  private readonly rules: ClassRule[];

  constructor(rules: ClassRule[] = []) {
    this.rules = rules;
  }

  static fromCss(sources: string[]): StyleSheet {
    return new StyleSheet(sources.flatMap(parseStylesheet));
  }

  get size(): number {
    return this.rules.length;
  }

  /**
   * Declarations that apply to an element with the given classes, in
   * stylesheet order (the order the cascade applies them).
   */
  declarationsFor(classNames: readonly string[]): Declarations[] {
    if (classNames.length === 0) return [];
    const wanted = new Set(classNames);
    return this.rules.filter(rule => wanted.has(rule.className)).map(rule => rule.declarations);
  }
}

/** First family of a `font-family` list, with quotes removed. */
export function parseFontFamily(value: string | undefined): string | null {
  if (value === undefined) return null;
  const first = value.split(',')[0].trim().replace(/^['"]|['"]$/g, '').trim();
  return first === '' ? null : first;
}

/** `true`/`false` for a decisive weight, `null` when the value should be ignored. */
export function parseFontWeight(value: string | undefined): boolean | null {
  if (value === undefined) return null;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'bold' || normalized === 'bolder') return true;
  if (normalized === 'normal' || normalized === 'lighter') return false;

  const numeric = Number(normalized);
  if (normalized !== '' && Number.isFinite(numeric)) {
    return numeric > 400;
  }
  return null;
}

export function parseFontStyle(value: string | undefined): boolean | null {
  if (value === undefined) return null;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'italic' || normalized.startsWith('oblique')) return true;
  if (normalized === 'normal') return false;
  return null;
}

/**
 * Resolves the style of an element from its parent's style, its tag and the
 * declaration sets that apply to it (class rules first, inline style last).
 */
export function resolveStyle(
  parent: StyleDescriptor,
  tagName: string,
  declarationSets: readonly Declarations[]
): StyleDescriptor {
  const tag = tagName.toLowerCase();
  let fontFamily = parent.fontFamily;
  let bold = parent.bold || BOLD_TAGS.has(tag);
  let italic = parent.italic || ITALIC_TAGS.has(tag);
  const monospace = parent.monospace || MONOSPACE_TAGS.has(tag);

  for (const declarations of declarationSets) {
    fontFamily = parseFontFamily(declarations.get('font-family')) ?? fontFamily;
    bold = parseFontWeight(declarations.get('font-weight')) ?? bold;
    italic = parseFontStyle(declarations.get('font-style')) ?? italic;
  }

  if (
    fontFamily === parent.fontFamily &&
    bold === parent.bold &&
    italic === parent.italic &&
    monospace === parent.monospace
  ) {
    return parent;
  }

  return { fontFamily, bold, italic, monospace };
}
