import { format, type Options } from 'prettier';
import { DEFAULT_FORMATTER_OPTIONS, type FormatterOptions } from '../models/options.js';

/**
 * Final canonicalization pass over emitted Markdown. Implementations must not
 * change meaning, only layout.
 */
export interface MarkdownFormatter {
  readonly name: string;
  format(markdown: string): Promise<string>;
}

/** Formats with prettier's Markdown printer (CommonMark + GFM tables). */
export class PrettierFormatter implements MarkdownFormatter {
  readonly name = 'prettier';
  private readonly options: Options;

  constructor(options: Partial<FormatterOptions> = {}) {
    const { printWidth, proseWrap } = { ...DEFAULT_FORMATTER_OPTIONS, ...options };
    this.options = {
      parser: 'markdown',
      printWidth,
      proseWrap,
      tabWidth: 2,
      useTabs: false,
    };
  }

  async format(markdown: string): Promise<string> {
    return format(markdown, this.options);
  }
}
