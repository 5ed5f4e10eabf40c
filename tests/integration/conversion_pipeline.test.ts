import { readFileSync } from 'fs';
import { join } from 'path';
import { ParseError } from '../../src/core/errors.js';
import { convertHtml, DocumentConverter, type ConverterOptions } from '../../src/core/converter.js';
import type { MarkdownFormatter } from '../../src/transform/markdownFormatter.js';
import { logger } from '../../src/util/logger.js';

const fixture = (name: string) => readFileSync(join(__dirname, '..', 'fixtures', name), 'utf8');

describe('Integration: conversion pipeline', () => {
  beforeAll(() => {
    logger.setSink(() => undefined);
  });

  describe('exported document', () => {
    it('converts the fixture to the expected Markdown', async () => {
      const result = await new DocumentConverter({ formatter: null }).convert(
        fixture('google-doc-export.html'),
        'google-doc-export.html'
      );

      expect(result.markdown).toBe(fixture('google-doc-export.md'));
    });

    it('reports caveats and statistics', async () => {
      const result = await new DocumentConverter({ formatter: null }).convert(fixture('google-doc-export.html'));

      expect(result.caveats).toEqual([
        { kind: 'language-unknown', message: 'No language detected for code block starting "ls -la"' },
        { kind: 'header-synthesized', message: 'Table 1 has no header row; an empty header row was inserted' },
      ]);
      expect(result.stats).toEqual({ blocks: 9, codeBlocks: 2, linksRewritten: 1, tables: 1 });
    });

    it('logs each stage and every caveat', async () => {
      const lines: string[] = [];
      logger.setLevel('info');
      logger.setFormat('json');
      logger.setSink(line => {
        lines.push(line);
      });

      try {
        await new DocumentConverter({ formatter: null }).convert(fixture('google-doc-export.html'));
      } finally {
        logger.setLevel('warn');
        logger.setFormat('human');
        logger.setSink(() => undefined);
      }

      const records = lines.map((line): unknown => JSON.parse(line));
      expect(records).toContainEqual(expect.objectContaining({ level: 'info', msg: 'Merging code blocks' }));
      expect(records).toContainEqual(
        expect.objectContaining({ level: 'warn', caveat: 'header-synthesized' })
      );
    });
  });

  describe('scenarios', () => {
    const convert = (html: string, options: ConverterOptions = {}) => convertHtml(html, { formatter: null, ...options });

    it('fences a paragraph set in a code font and tags python', async () => {
      await expect(convert(`<p style="font-family:'Courier New'">print('hi')</p>`)).resolves.toBe(
        "```python\nprint('hi')\n```\n"
      );
    });

    it('merges two code paragraphs around a blank one into one fence', async () => {
      const html =
        '<style>.m{font-family:Consolas}</style><p class="m">a = 1</p><p></p><p class="m">b = 2</p><p>done</p>';
      await expect(convert(html)).resolves.toBe('```\na = 1\n\nb = 2\n```\n\ndone\n');
    });

    it('unwraps google redirect links', async () => {
      await expect(
        convert('<p><a href="https://www.google.com/url?q=https://example.com&sa=D">text</a></p>')
      ).resolves.toBe('[text](https://example.com)\n');
    });

    it('keeps backtick code inside a link inline', async () => {
      await expect(convert('<p><a href="https://x.test/">`cfg`</a></p>')).resolves.toBe('[`cfg`](https://x.test/)\n');
    });

    it('drops empty paragraphs', async () => {
      await expect(convert('<p>a</p><p></p><p> </p><p><br></p><p>b</p>')).resolves.toBe('a\n\nb\n');
    });

    it('inserts a header row and pads short rows', async () => {
      await expect(
        convert('<table><tr><td>a</td><td>b</td></tr><tr><td>c</td></tr></table>')
      ).resolves.toBe('|  |  |\n| --- | --- |\n| a | b |\n| c |  |\n');
    });

    it('unwraps single-cell tables unless disabled', async () => {
      const html = '<table><tr><td>only</td></tr></table>';
      await expect(convert(html)).resolves.toBe('only\n');
      await expect(convert(html, { unwrapSingleCellTables: false })).resolves.toBe('|  |\n| --- |\n| only |\n');
    });

    it('uses custom code fonts and language rules', async () => {
      const html = '<p style="font-family:Monaco">SELECT 1;</p>';
      await expect(
        convert(html, { codeFonts: ['Monaco'], languageRules: [{ language: 'sql', patterns: [/^select\b/im] }] })
      ).resolves.toBe('```sql\nSELECT 1;\n```\n');
    });

    it('rejects input without HTML', async () => {
      await expect(convert('')).rejects.toBeInstanceOf(ParseError);
    });
  });

  describe('formatter', () => {
    it('hands the serialized Markdown to the formatter', async () => {
      const seen: string[] = [];
      const formatter: MarkdownFormatter = {
        name: 'recording',
        format: async markdown => {
          seen.push(markdown);
          return `${markdown}<!-- formatted -->\n`;
        },
      };

      await expect(convertHtml('<p>x</p>', { formatter })).resolves.toBe('x\n<!-- formatted -->\n');
      expect(seen).toEqual(['x\n']);
    });
  });
});
