/**
 * localize-extract - UI text externalization and translation tool
 *
 * Finds user-visible literals in source files, rewrites them into
 * localization calls and maintains per-locale resource modules.
 */

// Extraction and rewriting
export {
  planLocalization,
  localizeContent,
  localizeFile,
  localizeDirectory,
  mergeResults,
  DEFAULT_NAMESPACE,
  DEFAULT_INCLUDE,
  DEFAULT_EXCLUDE
} from './core/extractor.js';
export { isUserVisibleText, isTranslatableTemplate, isImportLine, isAlreadyLocalized } from './core/classifier.js';
export { generateKey, sanitizeKey } from './core/keys.js';
export {
  splitTemplate,
  toNumberedForm,
  toCodeForm,
  stripPlaceholders,
  placeholderExpressions
} from './core/template.js';
export { rewriteSource, wrapTemplate, ensureLocalizationImport, ensureLocaleUpdates } from './core/rewriter.js';
export { scanLiterals, scanWithParser, scanWithRegex, parseSource, ParseError } from './core/scanner.js';
export { DEFAULT_CONVENTIONS } from './core/conventions.js';

// Resource files
export {
  parseResources,
  mergeResources,
  diffResources,
  serializeResources,
  readResourceFile,
  writeResourceFile,
  sortKeys,
  fromRecord,
  findMissing,
  findUnused,
  getCoverage,
  TRANSLATION_ERROR
} from './core/resources.js';

// Descriptor
export { readDescriptor, parseDescriptor, namespaceFromIdentifier, addMetaDescription, DescriptorError } from './core/descriptor.js';

// Translation
export {
  translateAll,
  translateLanguage,
  translateResources,
  translateBatch,
  withSession,
  resolveDialects,
  languageLabel,
  DEFAULT_DIALECTS,
  DEFAULT_LANGUAGES
} from './core/translator.js';
export type { LanguageOutput } from './core/translator.js';
export { localizeProject } from './core/project.js';
export type { ProjectOptions, ProjectResult } from './core/project.js';

// Types
export type {
  SourceSpan,
  QuoteKind,
  ResourceEntry,
  ResourceMap,
  PlainReplacement,
  TemplateLocalization,
  LocalizationConventions,
  FileLocalization,
  ProgressInfo,
  Reporter,
  ProcessOptions,
  ProjectDescriptor,
  TranslationSession,
  TranslationProvider,
  TranslateOptions,
  Coverage
} from './plugins/types.js';

// Translation plugins
export { createOpenAIPlugin, systemPrompt } from './plugins/openai.js';
export type { CompletionFn, CompletionRequest, OpenAIPluginOptions } from './plugins/openai.js';

// CLI
export { main as runCli } from './cli.js';
