import { PLAIN_STYLE, textRun, type DocumentTree } from '../../src/models/document.js';
import { codeFence, escapeBlockStart, MarkdownEmitter } from '../../src/transform/markdownEmitter.js';
import type { MarkdownFormatter } from '../../src/transform/markdownFormatter.js';

describe('Unit: markdown emitter', () => {
  const emitter = new MarkdownEmitter();

  describe('escapeBlockStart', () => {
    it.each([
      ['# not a heading', '\\# not a heading'],
      ['#', '\\#'],
      ['> quoted', '\\> quoted'],
      ['- item', '\\- item'],
      ['+ item', '\\+ item'],
      ['----', '\\----'],
      ['1. first', '1\\. first'],
      ['2024) review', '2024\\) review'],
      ['~~~', '\\~~~'],
      ['~~~~ python', '\\~~~~ python'],
    ])('escapes %s', (line, expected) => {
      expect(escapeBlockStart(line)).toBe(expected);
    });

    it.each(['#hashtag', '-dash', '1.5 litres', '~~ two tildes', 'plain'])('leaves %s alone', line => {
      expect(escapeBlockStart(line)).toBe(line);
    });
  });

  describe('codeFence', () => {
    it('tags the fence with the language', () => {
      expect(codeFence({ kind: 'code', text: 'print(1)', language: 'python', start: 0, end: 0 })).toBe(
        '```python\nprint(1)\n```'
      );
    });

    it('lengthens the fence past backtick runs in the content', () => {
      expect(codeFence({ kind: 'code', text: 'a ``` b', language: null, start: 0, end: 0 })).toBe(
        '````\na ``` b\n````'
      );
    });
  });

  describe('serialize', () => {
    it('renders blocks separated by blank lines', () => {
      const document: DocumentTree = {
        blocks: [
          { kind: 'heading', level: 2, inlines: [textRun('Title', { ...PLAIN_STYLE, bold: true })] },
          { kind: 'paragraph', inlines: [textRun('Hello '), textRun('world', { ...PLAIN_STYLE, italic: true })] },
          { kind: 'paragraph', inlines: [] },
          { kind: 'rule' },
          { kind: 'code', text: 'x = 1', language: null, start: 4, end: 4 },
        ],
      };
      expect(emitter.serialize(document)).toEqual({
        markdown: '## Title\n\nHello *world*\n\n---\n\n```\nx = 1\n```\n',
        caveats: [],
      });
    });

    it('escapes every line of a paragraph', () => {
      const { markdown } = emitter.serialize({
        blocks: [{ kind: 'paragraph', inlines: [textRun('- a'), { kind: 'break' }, textRun('+ b')] }],
      });
      expect(markdown).toBe('\\- a\\\n\\+ b\n');
    });

    it('keeps a tilde line from opening a fence', () => {
      const { markdown } = emitter.serialize({
        blocks: [
          { kind: 'paragraph', inlines: [textRun('~~~')] },
          { kind: 'paragraph', inlines: [textRun('after')] },
        ],
      });
      expect(markdown).toBe('\\~~~\n\nafter\n');
    });

    it('indents nested list items under their parent', () => {
      const { markdown } = emitter.serialize({
        blocks: [
          {
            kind: 'list',
            items: [
              { depth: 0, ordered: false, inlines: [textRun('one')] },
              { depth: 1, ordered: false, inlines: [textRun('child')] },
              { depth: 3, ordered: false, inlines: [textRun('deep')] },
              { depth: 0, ordered: true, inlines: [textRun('num')] },
              { depth: 1, ordered: true, inlines: [textRun('sub')] },
            ],
          },
        ],
      });
      expect(markdown).toBe('- one\n  - child\n    - deep\n1. num\n   1. sub\n');
    });

    it('reports synthesized table headers', () => {
      const { markdown, caveats } = emitter.serialize({
        blocks: [
          {
            kind: 'table',
            rows: [{ header: false, cells: [{ blocks: [{ kind: 'paragraph', inlines: [textRun('a')] }] }, { blocks: [] }] }],
          },
        ],
      });
      expect(markdown).toBe('|  |  |\n| --- | --- |\n| a |  |\n');
      expect(caveats).toEqual([
        { kind: 'header-synthesized', message: 'Table 1 has no header row; an empty header row was inserted' },
      ]);
    });

    it('renders an empty document as an empty string', () => {
      expect(emitter.serialize({ blocks: [{ kind: 'paragraph', inlines: [] }] })).toEqual({ markdown: '', caveats: [] });
    });
  });

  describe('emit', () => {
    const document: DocumentTree = { blocks: [{ kind: 'paragraph', inlines: [textRun('text')] }] };

    it('passes the serialized Markdown through the formatter', async () => {
      const formatter: MarkdownFormatter = { name: 'upper', format: async markdown => markdown.toUpperCase() };
      await expect(new MarkdownEmitter(formatter).emit(document)).resolves.toEqual({ markdown: 'TEXT\n', caveats: [] });
    });

    it('returns the serialized Markdown without a formatter', async () => {
      await expect(emitter.emit(document)).resolves.toEqual({ markdown: 'text\n', caveats: [] });
    });

    it('propagates formatter failures', async () => {
      const formatter: MarkdownFormatter = {
        name: 'broken',
        format: async () => {
          throw new Error('formatter crashed');
        },
      };
      await expect(new MarkdownEmitter(formatter).emit(document)).rejects.toThrow('formatter crashed');
    });
  });
});
