import { ConfigError } from '../core/errors.js';
import {
  DEFAULT_FORMATTER_OPTIONS,
  defaultConversionOptions,
  type ConversionOptions,
  type FormatterOptions,
  type LanguageRule,
  type ProseWrap,
  type TrackingWrapper,
} from '../models/options.js';
import { isLogFormat, isLogLevel, LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from './logger.js';

export interface RawEnv {
  LOG_LEVEL?: string;
  LOG_FORMAT?: string;
  DOC2MD_CODE_FONTS?: string;
}

export interface CliFlags {
  inputPath: string;
  outputPath: string;
  verbose?: number;
  format?: boolean;
  logFormat?: string;
}

/** Settings read from a YAML configuration file, already validated. */
export interface FileConfig {
  codeFonts?: string[];
  trackingWrappers?: TrackingWrapper[];
  languageRules?: LanguageRule[];
  unwrapSingleCellTables?: boolean;
  format?: boolean;
  printWidth?: number;
  proseWrap?: ProseWrap;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
}

export interface Doc2MdConfig {
  inputPath: string;
  outputPath: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  format: boolean;
  formatter: FormatterOptions;
  conversion: ConversionOptions;
}

const PROSE_WRAPS: readonly ProseWrap[] = ['always', 'never', 'preserve'];

const FILE_KEYS = new Set<string>([
  'codeFonts', 'trackingWrappers', 'languageRules', 'unwrapSingleCellTables',
  'format', 'printWidth', 'proseWrap', 'logLevel', 'logFormat',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectString(value: unknown, field: string, source: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${source}: ${field} must be a non-empty string`);
  }
  return value.trim();
}

function expectStringList(value: unknown, field: string, source: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${source}: ${field} must be a list of strings`);
  }
  return value.map((entry, index) => expectString(entry, `${field}[${index}]`, source));
}

function expectBoolean(value: unknown, field: string, source: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${source}: ${field} must be true or false`);
  }
  return value;
}

/** User patterns are multi-line: `^` anchors at every line of a snippet. */
function compilePattern(pattern: string, field: string, source: string): RegExp {
  try {
    return new RegExp(pattern, 'm');
  } catch (error) {
    throw new ConfigError(`${source}: ${field} is not a valid regular expression: ${pattern}`, { cause: error });
  }
}

function parseTrackingWrappers(value: unknown, source: string): TrackingWrapper[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${source}: trackingWrappers must be a list`);
  }
  return value.map((entry, index) => {
    const field = `trackingWrappers[${index}]`;
    if (!isRecord(entry)) {
      throw new ConfigError(`${source}: ${field} must be a mapping with hostname, pathname and param`);
    }
    const pathname = expectString(entry.pathname, `${field}.pathname`, source);
    return {
      hostname: expectString(entry.hostname, `${field}.hostname`, source).toLowerCase(),
      pathname: pathname.startsWith('/') ? pathname : `/${pathname}`,
      param: expectString(entry.param, `${field}.param`, source),
    };
  });
}

function parseLanguageRules(value: unknown, source: string): LanguageRule[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${source}: languageRules must be a list`);
  }
  return value.map((entry, index) => {
    const field = `languageRules[${index}]`;
    if (!isRecord(entry)) {
      throw new ConfigError(`${source}: ${field} must be a mapping with language and patterns`);
    }
    const patterns = expectStringList(entry.patterns, `${field}.patterns`, source);
    if (patterns.length === 0) {
      throw new ConfigError(`${source}: ${field}.patterns must not be empty`);
    }
    return {
      language: expectString(entry.language, `${field}.language`, source),
      patterns: patterns.map((pattern, p) => compilePattern(pattern, `${field}.patterns[${p}]`, source)),
    };
  });
}

function parsePrintWidth(value: unknown, source: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 20 || value > 1000) {
    throw new ConfigError(`${source}: printWidth must be an integer between 20 and 1000`);
  }
  return value;
}

function parseEnumValue<T extends string>(
  value: unknown,
  field: string,
  allowed: readonly T[],
  source: string
): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new ConfigError(`${source}: ${field} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

/**
 * Validates the parsed contents of a configuration file.
 */
export function parseFileConfig(raw: unknown, source: string): FileConfig {
  if (raw === null || raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: configuration must be a mapping`);
  }

  const unknownKeys = Object.keys(raw).filter(key => !FILE_KEYS.has(key));
  if (unknownKeys.length > 0) {
    throw new ConfigError(`${source}: unknown option(s): ${unknownKeys.join(', ')}`);
  }

  const config: FileConfig = {};
  if (raw.codeFonts !== undefined) config.codeFonts = expectStringList(raw.codeFonts, 'codeFonts', source);
  if (raw.trackingWrappers !== undefined) config.trackingWrappers = parseTrackingWrappers(raw.trackingWrappers, source);
  if (raw.languageRules !== undefined) config.languageRules = parseLanguageRules(raw.languageRules, source);
  if (raw.unwrapSingleCellTables !== undefined) {
    config.unwrapSingleCellTables = expectBoolean(raw.unwrapSingleCellTables, 'unwrapSingleCellTables', source);
  }
  if (raw.format !== undefined) config.format = expectBoolean(raw.format, 'format', source);
  if (raw.printWidth !== undefined) config.printWidth = parsePrintWidth(raw.printWidth, source);
  if (raw.proseWrap !== undefined) config.proseWrap = parseEnumValue(raw.proseWrap, 'proseWrap', PROSE_WRAPS, source);
  if (raw.logLevel !== undefined) {
    config.logLevel = parseEnumValue(raw.logLevel, 'logLevel', LOG_LEVELS, source);
  }
  if (raw.logFormat !== undefined) {
    config.logFormat = parseEnumValue(raw.logFormat, 'logFormat', LOG_FORMATS, source);
  }
  return config;
}

/** `-v` once means info, twice or more debug. */
export function levelForVerbosity(verbose: number): LogLevel {
  if (verbose >= 2) return 'debug';
  if (verbose === 1) return 'info';
  return 'warn';
}

function resolveLogLevel(env: RawEnv, flags: CliFlags, file: FileConfig): LogLevel {
  if (flags.verbose && flags.verbose > 0) return levelForVerbosity(flags.verbose);
  if (env.LOG_LEVEL) {
    if (!isLogLevel(env.LOG_LEVEL)) {
      throw new ConfigError(`LOG_LEVEL must be one of: debug, info, warn, error (got "${env.LOG_LEVEL}")`);
    }
    return env.LOG_LEVEL;
  }
  return file.logLevel ?? 'warn';
}

function resolveLogFormat(env: RawEnv, flags: CliFlags, file: FileConfig): LogFormat {
  const candidate = flags.logFormat ?? env.LOG_FORMAT;
  if (candidate !== undefined && candidate !== '') {
    if (!isLogFormat(candidate)) {
      throw new ConfigError(`Log format must be one of: human, json (got "${candidate}")`);
    }
    return candidate;
  }
  return file.logFormat ?? 'human';
}

function parseFontList(value: string): string[] {
  return value.split(',').map(font => font.trim()).filter(Boolean);
}

/**
 * Merges defaults, configuration file, environment and flags (in increasing
 * precedence) into the settings of one run.
 */
export function buildConfig(env: RawEnv, flags: CliFlags, file: FileConfig = {}): Doc2MdConfig {
  if (!flags.inputPath) throw new ConfigError('An input path is required');
  if (!flags.outputPath) throw new ConfigError('An output path is required');

  const defaults = defaultConversionOptions();
  const envFonts = env.DOC2MD_CODE_FONTS ? parseFontList(env.DOC2MD_CODE_FONTS) : undefined;

  return {
    inputPath: flags.inputPath,
    outputPath: flags.outputPath,
    logLevel: resolveLogLevel(env, flags, file),
    logFormat: resolveLogFormat(env, flags, file),
    // --no-format wins; otherwise the file decides
    format: flags.format === false ? false : file.format ?? true,
    formatter: {
      printWidth: file.printWidth ?? DEFAULT_FORMATTER_OPTIONS.printWidth,
      proseWrap: file.proseWrap ?? DEFAULT_FORMATTER_OPTIONS.proseWrap,
    },
    conversion: {
      codeFonts: envFonts ?? file.codeFonts ?? defaults.codeFonts,
      trackingWrappers: file.trackingWrappers ?? defaults.trackingWrappers,
      languageRules: file.languageRules ?? defaults.languageRules,
      unwrapSingleCellTables: file.unwrapSingleCellTables ?? defaults.unwrapSingleCellTables,
    },
  };
}
