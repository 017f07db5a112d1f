import fs from 'fs/promises';
import path from 'path';
import type {
  FileLocalization,
  LocalizationConventions,
  Reporter,
  ResourceMap,
  TranslationProvider
} from '../plugins/types.js';
import { DEFAULT_CONVENTIONS } from './conventions.js';
import { addMetaDescription, namespaceFromIdentifier, readDescriptor } from './descriptor.js';
import { DEFAULT_NAMESPACE, localizeDirectory, mergeResults } from './extractor.js';
import { mergeResources, readResourceFile, writeResourceFile } from './resources.js';
import { DEFAULT_LANGUAGES, resolveDialects, translateAll } from './translator.js';
import type { LanguageOutput } from './translator.js';

export const BASE_LOCALE = 'en';
export const I18N_DIR = 'i18n';

export interface ProjectOptions {
  /** Project root */
  root: string;
  /** Source directory, relative to root */
  source?: string;
  include?: string;
  exclude?: string[];
  /** Key namespace (default: from the descriptor) */
  namespace?: string;
  /** Descriptor path, relative to root (default: package.json) */
  descriptor?: string;
  languages?: string[];
  dialects?: string[];
  /** Translation provider; without one only the base locale is written */
  provider?: TranslationProvider;
  dryRun?: boolean;
  conventions?: LocalizationConventions;
  reporter?: Reporter;
}

export interface ProjectResult {
  namespace: string;
  files: FileLocalization[];
  /** Base-locale map as written to en.js */
  base: ResourceMap;
  baseFile: string;
  outputs: LanguageOutput[];
}

async function assertDirectory(dir: string): Promise<void> {
  const stats = await fs.stat(dir);
  if (!stats.isDirectory()) {
    throw new Error(`Not a directory: ${dir}`);
  }
}

/**
 * Extract, rewrite, merge with the existing base locale, then translate
 */
export async function localizeProject(options: ProjectOptions): Promise<ProjectResult> {
  const {
    root,
    source = 'src',
    include,
    exclude,
    descriptor: descriptorPath = 'package.json',
    languages = DEFAULT_LANGUAGES,
    provider,
    dryRun = false,
    conventions = DEFAULT_CONVENTIONS,
    reporter
  } = options;

  const sourceDir = path.resolve(root, source);
  await assertDirectory(sourceDir);

  const descriptor = await readDescriptor(path.resolve(root, descriptorPath), reporter);
  let namespace = options.namespace;
  if (!namespace) {
    if (descriptor.identifier) {
      namespace = namespaceFromIdentifier(descriptor.identifier);
    } else {
      reporter?.warn?.('Could not determine the project identifier, using generic key prefix');
      namespace = DEFAULT_NAMESPACE;
    }
  }

  const files = await localizeDirectory(sourceDir, { include, exclude, namespace, conventions, dryRun, reporter });
  const extracted = addMetaDescription(mergeResults(files), namespace, descriptor);

  const i18nDir = path.join(sourceDir, I18N_DIR);
  if (!dryRun) {
    await fs.mkdir(i18nDir, { recursive: true });
  }

  const baseFile = path.join(i18nDir, `${BASE_LOCALE}.js`);
  const existing = await readResourceFile(baseFile, conventions);
  const base = mergeResources(existing, extracted);
  if (!dryRun && (await writeResourceFile(baseFile, base, conventions))) {
    reporter?.written?.(baseFile);
  }

  let outputs: LanguageOutput[] = [];
  if (provider) {
    outputs = await translateAll(base, provider, {
      outputDir: i18nDir,
      languages,
      dialects: resolveDialects(languages, options.dialects),
      conventions,
      dryRun,
      reporter
    });
  }

  return { namespace, files, base, baseFile, outputs };
}
