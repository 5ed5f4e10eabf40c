import { PLAIN_STYLE } from '../../src/models/document.js';
import {
  parseDeclarations,
  parseFontFamily,
  parseFontStyle,
  parseFontWeight,
  parseStylesheet,
  resolveStyle,
  StyleSheet,
} from '../../src/transform/styleResolver.js';

describe('Unit: style resolver', () => {
  describe('parseDeclarations', () => {
    it('lower-cases properties and drops !important', () => {
      const declarations = parseDeclarations('Font-Weight: 700 !important; color:#000;;font-style:italic');
      expect(declarations.get('font-weight')).toBe('700');
      expect(declarations.get('color')).toBe('#000');
      expect(declarations.get('font-style')).toBe('italic');
      expect(declarations.size).toBe(3);
    });

    it('skips declarations without a value', () => {
      expect(parseDeclarations('font-family:; margin').size).toBe(0);
    });
  });

  describe('parseStylesheet', () => {
    it('keeps single-class rules in order, including grouped selectors', () => {
      const rules = parseStylesheet(
        '/* generated */ @import url(x.css); .c1{font-weight:700} p .c2{color:red} .c3, .c4 {font-family:"Courier New"} ol{margin:0}'
      );
      expect(rules.map(rule => rule.className)).toEqual(['c1', 'c3', 'c4']);
      expect(rules[1].declarations.get('font-family')).toBe('"Courier New"');
    });
  });

  describe('StyleSheet', () => {
    it('returns declarations for matching classes in stylesheet order', () => {
      const sheet = StyleSheet.fromCss(['.a{font-weight:700}', '.b{font-weight:400} .c{font-style:italic}']);
      expect(sheet.size).toBe(3);
      const sets = sheet.declarationsFor(['b', 'a']);
      expect(sets.map(set => set.get('font-weight'))).toEqual(['700', '400']);
      expect(sheet.declarationsFor([])).toEqual([]);
    });
  });

  describe('value parsers', () => {
    it('takes the first font family without quotes', () => {
      expect(parseFontFamily("'Courier New', monospace")).toBe('Courier New');
      expect(parseFontFamily('"Arial"')).toBe('Arial');
      expect(parseFontFamily('""')).toBeNull();
      expect(parseFontFamily(undefined)).toBeNull();
    });

    it('treats weights above 400 as bold', () => {
      expect(parseFontWeight('700')).toBe(true);
      expect(parseFontWeight('401')).toBe(true);
      expect(parseFontWeight('400')).toBe(false);
      expect(parseFontWeight('bold')).toBe(true);
      expect(parseFontWeight('normal')).toBe(false);
      expect(parseFontWeight('inherit')).toBeNull();
    });

    it('recognises italic and oblique', () => {
      expect(parseFontStyle('italic')).toBe(true);
      expect(parseFontStyle('oblique 10deg')).toBe(true);
      expect(parseFontStyle('normal')).toBe(false);
      expect(parseFontStyle('inherit')).toBeNull();
    });
  });

  describe('resolveStyle', () => {
    it('returns the parent style when nothing changes', () => {
      expect(resolveStyle(PLAIN_STYLE, 'span', [])).toBe(PLAIN_STYLE);
    });

    it('applies tag defaults', () => {
      expect(resolveStyle(PLAIN_STYLE, 'STRONG', [])).toEqual({ ...PLAIN_STYLE, bold: true });
      expect(resolveStyle(PLAIN_STYLE, 'em', [])).toEqual({ ...PLAIN_STYLE, italic: true });
      expect(resolveStyle(PLAIN_STYLE, 'code', [])).toEqual({ ...PLAIN_STYLE, monospace: true });
    });

    it('lets CSS override tag defaults and inline style override classes', () => {
      const classRule = parseDeclarations('font-weight:700;font-family:Arial');
      const inline = parseDeclarations('font-weight:400');
      expect(resolveStyle(PLAIN_STYLE, 'span', [classRule, inline])).toEqual({
        fontFamily: 'Arial',
        bold: false,
        italic: false,
        monospace: false,
      });
      expect(resolveStyle(PLAIN_STYLE, 'b', [inline]).bold).toBe(false);
    });

    it('inherits from the parent', () => {
      const parent = { fontFamily: 'Consolas', bold: true, italic: false, monospace: false };
      expect(resolveStyle(parent, 'span', [parseDeclarations('font-style:italic')])).toEqual({
        fontFamily: 'Consolas',
        bold: true,
        italic: true,
        monospace: false,
      });
    });
  });
});
