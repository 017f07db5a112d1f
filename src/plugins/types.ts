/**
 * Type utility for sync or async values
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Delimiter of a scanned literal
 */
export type QuoteKind = "'" | '"' | '`';

/**
 * A literal occurrence found in a source file
 */
export interface SourceSpan {
  /** Raw text between the delimiters, escapes untouched */
  raw: string;
  /** Delimiter the literal was written with */
  quote: QuoteKind;
  /** Offset of the opening delimiter */
  start: number;
  /** Offset just past the closing delimiter */
  end: number;
}

/**
 * A single resource value. Template values carry numbered placeholders ({0}, {1}, ...)
 */
export interface ResourceEntry {
  readonly value: string;
  readonly isTemplate: boolean;
}

/**
 * Ordered key → entry mapping for one locale or dialect
 */
export type ResourceMap = Map<string, ResourceEntry>;

/**
 * A plain literal scheduled for rewriting
 */
export interface PlainReplacement {
  /** Raw literal text as it appears between the quotes */
  raw: string;
  quote: QuoteKind;
  /** Resource key */
  key: string;
  /** Offset of the opening quote */
  start: number;
  /** Offset just past the closing quote */
  end: number;
}

/**
 * Transient record used while rewriting one template literal
 */
export interface TemplateLocalization {
  /** Original literal including the backticks */
  literal: string;
  /** Resource form, placeholders numbered {0}, {1}, ... */
  numbered: string;
  /** Code form, placeholders renamed ${placeholder0}, ${placeholder1}, ... */
  codeTemplate: string;
  /** Original placeholder expressions, in order */
  expressions: string[];
  key: string;
  /** Leading whitespace of the line the literal was found on */
  indent: string;
  /** Offset of the opening backtick */
  start: number;
  /** Offset just past the closing backtick */
  end: number;
}

/**
 * Identifiers emitted into rewritten sources and resource files
 */
export interface LocalizationConventions {
  /** Primary localization call, e.g. msg('Text', { id }) */
  callName: string;
  /** Template-tagging helper, e.g. str`Hello ${name}` */
  tagName: string;
  /** Locale-change subscription helper */
  subscribeName: string;
  /** Module rewritten sources import the helpers from */
  importSource: string;
  /** Module resource files import the tag from */
  resourceTagSource: string;
}

/**
 * Result of localizing one file
 */
export interface FileLocalization {
  file: string;
  original: string;
  updated: string;
  changed: boolean;
  /** The file's contribution to the base-locale map */
  entries: ResourceMap;
}

/**
 * Progress information during directory processing
 */
export interface ProgressInfo {
  /** Current file being processed */
  file: string;
  /** Number of files processed */
  current: number;
  /** Total number of files to process */
  total: number;
}

/**
 * Callbacks core operations report through. The CLI decides how to render them.
 */
export interface Reporter {
  progress?: (progress: ProgressInfo) => void;
  warn?: (message: string) => void;
  written?: (file: string) => void;
}

/**
 * Options for processing a source directory
 */
export interface ProcessOptions {
  /** Glob pattern to include */
  include?: string;
  /** Glob patterns to exclude */
  exclude?: string[];
  /** Key namespace */
  namespace?: string;
  conventions?: LocalizationConventions;
  /** Compute changes without writing rewritten files */
  dryRun?: boolean;
  reporter?: Reporter;
}

/**
 * Project descriptor metadata
 */
export interface ProjectDescriptor {
  /** Namespace-defining identifier */
  identifier?: string;
  /** Human-readable description */
  description?: string;
}

/**
 * A scoped translation session. Callers must close it on every exit path.
 */
export interface TranslationSession {
  /**
   * Translate a text into the language described by the label
   * @param languageLabel - English display name, e.g. "French (Canada)"
   */
  translate(languageLabel: string, text: string): Promise<string>;
  close(): MaybePromise<void>;
}

/**
 * Translation provider plugin
 *
 * Providers hand out sessions; the orchestrator opens one per batch and
 * closes it whether the batch succeeds or fails.
 */
export interface TranslationProvider {
  /** Plugin name (e.g., 'openai') */
  name: string;

  openSession(): MaybePromise<TranslationSession>;

  /**
   * Check if the provider is configured
   * @returns true if the provider can be used
   */
  isAvailable(): boolean;
}

/**
 * Options for translating a base map
 */
export interface TranslateOptions {
  /** Directory resource files are written to */
  outputDir: string;
  /** Base languages to generate */
  languages: string[];
  /** Dialects per language */
  dialects?: Map<string, string[]>;
  conventions?: LocalizationConventions;
  dryRun?: boolean;
  reporter?: Reporter;
}

/**
 * Translation coverage statistics
 */
export interface Coverage {
  total: number;
  translated: number;
  missing: number;
  percentage: number;
}
