// Conversion settings shared by the pipeline stages and the config layer.

/**
 * A redirecting wrapper URL that carries the real destination in a query
 * parameter, e.g. `https://www.google.com/url?q=<target>&sa=D`.
 */
export interface TrackingWrapper {
  hostname: string;
  pathname: string;
  param: string;
}

export interface LanguageRule {
  language: string;
  patterns: RegExp[];
}

export type ProseWrap = 'always' | 'never' | 'preserve';

export interface FormatterOptions {
  printWidth: number;
  proseWrap: ProseWrap;
}

export interface ConversionOptions {
  codeFonts: string[];
  trackingWrappers: TrackingWrapper[];
  languageRules: LanguageRule[];
  unwrapSingleCellTables: boolean;
}

export const DEFAULT_CODE_FONTS: readonly string[] = [
  'fira code',
  'fira mono',
  'roboto mono',
  'source code pro',
  'courier new',
  'consolas',
];

export const DEFAULT_TRACKING_WRAPPERS: readonly TrackingWrapper[] = [
  { hostname: 'www.google.com', pathname: '/url', param: 'q' },
  { hostname: 'google.com', pathname: '/url', param: 'q' },
];

export const PYTHON_RULE: LanguageRule = {
  language: 'python',
  patterns: [
    /^\s*import\s+[\w.]+(?:\s+as\s+\w+)?(?:\s*,\s*[\w.]+(?:\s+as\s+\w+)?)*\s*$/m,
    /^\s*from\s+[\w.]+\s+import\s+/m,
    /^\s*(?:async\s+)?def\s+\w+\s*\(/m,
    /^\s*class\s+\w+\s*(?:\([^)]*\))?\s*:\s*$/m,
    /^\s*print\(/m,
    /^\s*if\s+__name__\s*==/m,
  ],
};

export const DEFAULT_FORMATTER_OPTIONS: FormatterOptions = {
  printWidth: 120,
  proseWrap: 'never',
};

export function defaultConversionOptions(): ConversionOptions {
  return {
    codeFonts: [...DEFAULT_CODE_FONTS],
    trackingWrappers: DEFAULT_TRACKING_WRAPPERS.map(wrapper => ({ ...wrapper })),
    languageRules: [PYTHON_RULE],
    unwrapSingleCellTables: true,
  };
}
