import path from 'path';
import type {
  ResourceMap,
  Reporter,
  TranslateOptions,
  TranslationProvider,
  TranslationSession
} from '../plugins/types.js';
import { DEFAULT_CONVENTIONS } from './conventions.js';
import { diffResources, entry, TRANSLATION_ERROR, writeResourceFile } from './resources.js';

export const DEFAULT_LANGUAGES = ['fr', 'de'];

export const DEFAULT_DIALECTS: ReadonlyMap<string, string[]> = new Map([
  ['fr', ['fr-FR', 'fr-CA']],
  ['de', ['de-AT', 'de-CH']]
]);

/**
 * English display label for a locale code: `fr-CA` → `French (Canada)`.
 * Unknown or malformed codes are returned as given.
 */
export function languageLabel(code: string): string {
  try {
    const names = new Intl.DisplayNames(['en'], { type: 'language', languageDisplay: 'standard' });
    return names.of(code) || code;
  } catch {
    return code;
  }
}

/**
 * Dialects to generate per language. Explicit dialects are grouped by the
 * language part before `-` and replace the defaults; codes without `-` are ignored.
 */
export function resolveDialects(languages: string[], overrides: string[] = []): Map<string, string[]> {
  const dialects = new Map<string, string[]>();
  const explicit = overrides.map(code => code.trim()).filter(code => code.includes('-'));

  if (explicit.length > 0) {
    for (const code of explicit) {
      const language = code.slice(0, code.indexOf('-'));
      dialects.set(language, [...(dialects.get(language) ?? []), code]);
    }
    return dialects;
  }

  for (const language of languages) {
    dialects.set(language, [...(DEFAULT_DIALECTS.get(language) ?? [])]);
  }
  return dialects;
}

/**
 * Run `work` inside a translation session that is closed on every exit path
 */
export async function withSession<T>(
  provider: TranslationProvider,
  work: (session: TranslationSession) => Promise<T>
): Promise<T> {
  const session = await provider.openSession();
  try {
    return await work(session);
  } finally {
    await session.close();
  }
}

/**
 * Translate every entry of a map, one at a time. Keys and template flags are
 * kept; an entry that fails to translate gets the error sentinel.
 */
export async function translateResources(
  base: ResourceMap,
  label: string,
  session: TranslationSession,
  reporter?: Reporter
): Promise<ResourceMap> {
  const translated: ResourceMap = new Map();

  for (const [key, value] of base) {
    let text: string;
    try {
      text = await session.translate(label, value.value);
    } catch (error) {
      reporter?.warn?.(
        `Failed to translate '${value.value}' to ${label}: ${error instanceof Error ? error.message : String(error)}`
      );
      text = TRANSLATION_ERROR;
    }
    translated.set(key, entry(text, value.isTemplate));
  }

  return translated;
}

/**
 * Translate a base map into a label within its own session
 */
export function translateBatch(
  base: ResourceMap,
  label: string,
  provider: TranslationProvider,
  reporter?: Reporter
): Promise<ResourceMap> {
  return withSession(provider, session => translateResources(base, label, session, reporter));
}

export interface LanguageOutput {
  locale: string;
  resources: ResourceMap;
  file: string;
  written: boolean;
}

async function emit(
  locale: string,
  resources: ResourceMap,
  options: TranslateOptions
): Promise<LanguageOutput> {
  const { outputDir, conventions = DEFAULT_CONVENTIONS, dryRun = false, reporter } = options;
  const file = path.join(outputDir, `${locale}.js`);
  const written = !dryRun && (await writeResourceFile(file, resources, conventions));
  if (written) {
    reporter?.written?.(file);
  }
  return { locale, resources, file, written };
}

/**
 * Write the full translation of a language, then a sparse override per dialect
 * holding only what differs from the language file
 */
export async function translateLanguage(
  base: ResourceMap,
  language: string,
  dialects: string[],
  provider: TranslationProvider,
  options: TranslateOptions
): Promise<LanguageOutput[]> {
  const outputs: LanguageOutput[] = [];
  const languageMap = await translateBatch(base, languageLabel(language), provider, options.reporter);
  outputs.push(await emit(language, languageMap, options));

  for (const dialect of dialects) {
    const dialectMap = await translateBatch(base, languageLabel(dialect), provider, options.reporter);
    outputs.push(await emit(dialect, diffResources(languageMap, dialectMap), options));
  }

  return outputs;
}

/**
 * Generate every configured language and its dialects, sequentially
 */
export async function translateAll(
  base: ResourceMap,
  provider: TranslationProvider,
  options: TranslateOptions
): Promise<LanguageOutput[]> {
  const languages = options.languages.map(language => language.trim()).filter(Boolean);
  const dialects = options.dialects ?? resolveDialects(languages);
  const outputs: LanguageOutput[] = [];

  for (const language of languages) {
    outputs.push(...(await translateLanguage(base, language, dialects.get(language) ?? [], provider, options)));
  }

  return outputs;
}
