import { ParseError } from '../../src/core/errors.js';
import { PLAIN_STYLE, textRun, type Block } from '../../src/models/document.js';
import { HtmlLoader } from '../../src/transform/htmlLoader.js';

const BOLD = { ...PLAIN_STYLE, bold: true };

function load(body: string, head = ''): readonly Block[] {
  return new HtmlLoader().load(`<html><head>${head}</head><body>${body}</body></html>`).blocks;
}

describe('Unit: HTML loader', () => {
  describe('errors', () => {
    it('rejects empty input', () => {
      expect(() => new HtmlLoader().load('  \n', 'page.html')).toThrow(
        new ParseError('page.html', 'input is empty')
      );
    });

    it('rejects input without elements', () => {
      expect(() => new HtmlLoader().load('just some text')).toThrow(
        'Failed to parse HTML at <input>: no HTML elements found'
      );
    });
  });

  describe('paragraphs and styles', () => {
    it('applies class rules from the stylesheet', () => {
      const blocks = load('<p class="c1">Hello <span>world</span></p>', '<style>.c1{font-weight:700}</style>');
      expect(blocks).toEqual([
        { kind: 'paragraph', inlines: [textRun('Hello ', BOLD), textRun('world', BOLD)] },
      ]);
    });

    it('inherits the body style', () => {
      const { blocks } = new HtmlLoader().load('<html><body style="font-family:Consolas"><p>x</p></body></html>');
      expect(blocks[0]).toEqual({
        kind: 'paragraph',
        inlines: [textRun('x', { ...PLAIN_STYLE, fontFamily: 'Consolas' })],
      });
    });

    it('collapses whitespace and trims around line breaks', () => {
      const [block] = load('<p>  a\n  b <br>  c  </p>');
      expect(block).toEqual({
        kind: 'paragraph',
        inlines: [textRun('a b'), { kind: 'break' }, textRun('c')],
      });
    });

    it('decodes entities and keeps non-breaking spaces', () => {
      const [block] = load('<p>a &amp; b&nbsp;c</p>');
      expect(block).toEqual({ kind: 'paragraph', inlines: [textRun('a & b\u00a0c')] });
    });

    it('keeps empty paragraphs as blank blocks', () => {
      const blocks = load('<p>a</p><p></p>');
      expect(blocks).toHaveLength(2);
      expect(blocks[1]).toEqual({ kind: 'paragraph', inlines: [] });
    });

    it('drops images', () => {
      expect(load('<p>a<img src="x.png">b</p>')).toEqual([
        { kind: 'paragraph', inlines: [textRun('a'), textRun('b')] },
      ]);
    });

    it('wraps loose inline content of containers in implicit paragraphs', () => {
      const blocks = load('<div>loose <b>text</b><p>para</p>tail</div>');
      expect(blocks).toEqual([
        { kind: 'paragraph', inlines: [textRun('loose '), textRun('text', BOLD)] },
        { kind: 'paragraph', inlines: [textRun('para')] },
        { kind: 'paragraph', inlines: [textRun('tail')] },
      ]);
    });

    it('keeps preformatted text verbatim', () => {
      const [block] = load('<pre>\nline1\n  line2\n</pre>');
      expect(block).toEqual({
        kind: 'paragraph',
        inlines: [textRun('line1\n  line2', { ...PLAIN_STYLE, monospace: true })],
      });
    });
  });

  describe('structure', () => {
    it('reads headings and rules', () => {
      expect(load('<h2>Title</h2><hr>')).toEqual([
        { kind: 'heading', level: 2, inlines: [textRun('Title')] },
        { kind: 'rule' },
      ]);
    });

    it('reads links with formatted children', () => {
      const [block] = load('<p><a href="https://x.test/">go <b>now</b></a></p>');
      expect(block).toEqual({
        kind: 'paragraph',
        inlines: [{ kind: 'link', href: 'https://x.test/', children: [textRun('go '), textRun('now', BOLD)] }],
      });
    });

    it('reads nested lists and merges adjacent lists', () => {
      const [block, ...rest] = load(
        '<ul><li>one</li><li>two<ul><li>nested</li></ul></li></ul><ol><li>first</li><li></li></ol>'
      );
      expect(rest).toEqual([]);
      expect(block).toEqual({
        kind: 'list',
        items: [
          { depth: 0, ordered: false, inlines: [textRun('one')] },
          { depth: 0, ordered: false, inlines: [textRun('two')] },
          { depth: 1, ordered: false, inlines: [textRun('nested')] },
          { depth: 0, ordered: true, inlines: [textRun('first')] },
        ],
      });
    });

    it('separates block children of a list item with a space', () => {
      const [block] = load('<ul><li><p>first para</p><p>second para</p></li><li>lead<div>tail</div></li></ul>');
      expect(block).toEqual({
        kind: 'list',
        items: [
          { depth: 0, ordered: false, inlines: [textRun('first para'), textRun(' '), textRun('second para')] },
          { depth: 0, ordered: false, inlines: [textRun('lead'), textRun(' '), textRun('tail')] },
        ],
      });
    });

    it('takes the nesting level from exporter list classes', () => {
      const [block] = load('<ul class="lst-kix_abc-0 start"><li>top</li></ul><ul class="lst-kix_abc-1 start"><li>deep</li></ul>');
      expect(block).toEqual({
        kind: 'list',
        items: [
          { depth: 0, ordered: false, inlines: [textRun('top')] },
          { depth: 1, ordered: false, inlines: [textRun('deep')] },
        ],
      });
    });

    it('reads tables and marks header rows', () => {
      const [block] = load('<table><tr><th>A</th><th>B</th></tr><tr><td>1</td><td>2</td></tr></table>');
      expect(block).toEqual({
        kind: 'table',
        rows: [
          {
            header: true,
            cells: [
              { blocks: [{ kind: 'paragraph', inlines: [textRun('A')] }] },
              { blocks: [{ kind: 'paragraph', inlines: [textRun('B')] }] },
            ],
          },
          {
            header: false,
            cells: [
              { blocks: [{ kind: 'paragraph', inlines: [textRun('1')] }] },
              { blocks: [{ kind: 'paragraph', inlines: [textRun('2')] }] },
            ],
          },
        ],
      });
    });

    it('treats thead rows as headers', () => {
      const [block] = load('<table><thead><tr><td>H</td></tr></thead><tbody><tr><td>v</td></tr></tbody></table>');
      expect(block.kind === 'table' && block.rows.map(row => row.header)).toEqual([true, false]);
    });
  });
});
