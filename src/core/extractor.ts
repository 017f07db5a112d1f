import fs from 'fs/promises';
import { glob } from 'glob';
import type {
  FileLocalization,
  LocalizationConventions,
  PlainReplacement,
  ProcessOptions,
  ResourceMap,
  TemplateLocalization
} from '../plugins/types.js';
import { isTranslatableTemplate, isUserVisibleText } from './classifier.js';
import { DEFAULT_CONVENTIONS } from './conventions.js';
import { generateKey } from './keys.js';
import { entry, unescapeString } from './resources.js';
import { rewriteSource } from './rewriter.js';
import { scanLiterals } from './scanner.js';
import {
  determineIndent,
  placeholderExpressions,
  stripPlaceholders,
  toCodeForm,
  toNumberedForm
} from './template.js';

export const DEFAULT_NAMESPACE = 'extension';
export const DEFAULT_INCLUDE = '**/*.js';
export const DEFAULT_EXCLUDE = ['node_modules/**', 'dist/**', '**/i18n/**'];

/**
 * Literals of one file that should be localized, with their keys
 */
export interface LocalizationPlan {
  replacements: PlainReplacement[];
  templates: TemplateLocalization[];
  entries: ResourceMap;
}

/**
 * Classify the literals of a file and assign keys.
 * Plain literals are keyed first, then templates, sharing one set of used keys.
 * Repeated text reuses its key; every classified occurrence is rewritten.
 */
export function planLocalization(
  content: string,
  file: string,
  namespace: string = DEFAULT_NAMESPACE,
  conventions: LocalizationConventions = DEFAULT_CONVENTIONS
): LocalizationPlan {
  const spans = scanLiterals(content, file);
  const usedKeys = new Set<string>();
  const entries: ResourceMap = new Map();
  const replacements: PlainReplacement[] = [];
  const templates: TemplateLocalization[] = [];
  const literalKeys = new Map<string, string>();
  const templateKeys = new Map<string, string>();

  for (const span of spans) {
    if (span.quote === '`' || !isUserVisibleText(span.raw, span.start, content, conventions)) {
      continue;
    }
    let key = literalKeys.get(span.raw);
    if (key === undefined) {
      const value = unescapeString(span.raw);
      key = generateKey(namespace, value, usedKeys);
      literalKeys.set(span.raw, key);
      entries.set(key, entry(value));
    }
    replacements.push({ raw: span.raw, quote: span.quote, key, start: span.start, end: span.end });
  }

  for (const span of spans) {
    if (span.quote !== '`' || !isTranslatableTemplate(span.raw, span.start, content, conventions)) {
      continue;
    }
    const numbered = unescapeString(toNumberedForm(span.raw));
    let key = templateKeys.get(span.raw);
    if (key === undefined) {
      key = generateKey(namespace, unescapeString(stripPlaceholders(span.raw)), usedKeys);
      templateKeys.set(span.raw, key);
      entries.set(key, entry(numbered, true));
    }
    templates.push({
      literal: '`' + span.raw + '`',
      numbered,
      codeTemplate: toCodeForm(span.raw),
      expressions: placeholderExpressions(span.raw),
      key,
      indent: determineIndent(content, span.start),
      start: span.start,
      end: span.end
    });
  }

  return { replacements, templates, entries };
}

/**
 * Localize one file's content in memory
 */
export function localizeContent(
  content: string,
  file: string,
  namespace: string = DEFAULT_NAMESPACE,
  conventions: LocalizationConventions = DEFAULT_CONVENTIONS
): FileLocalization {
  const plan = planLocalization(content, file, namespace, conventions);
  const updated = rewriteSource(content, plan.replacements, plan.templates, conventions);

  return {
    file,
    original: content,
    updated,
    changed: updated !== content,
    entries: plan.entries
  };
}

/**
 * Localize a file, writing it back only when its content changed
 */
export async function localizeFile(filePath: string, options: ProcessOptions = {}): Promise<FileLocalization> {
  const { namespace = DEFAULT_NAMESPACE, conventions = DEFAULT_CONVENTIONS, dryRun = false, reporter } = options;
  const content = await fs.readFile(filePath, 'utf-8');
  const result = localizeContent(content, filePath, namespace, conventions);

  if (result.changed && !dryRun) {
    await fs.writeFile(filePath, result.updated, 'utf-8');
    reporter?.written?.(filePath);
  }

  return result;
}

/**
 * Localize every matching file under a directory, one file at a time
 */
export async function localizeDirectory(dir: string, options: ProcessOptions = {}): Promise<FileLocalization[]> {
  const { include = DEFAULT_INCLUDE, exclude = DEFAULT_EXCLUDE, reporter } = options;

  const files = await glob(include, {
    cwd: dir,
    ignore: exclude,
    absolute: true,
    nodir: true
  });
  files.sort();

  const results: FileLocalization[] = [];
  let processed = 0;

  for (const file of files) {
    results.push(await localizeFile(file, options));
    processed++;
    reporter?.progress?.({ current: processed, total: files.length, file });
  }

  return results;
}

/**
 * Merge per-file maps. An earlier file's entry is kept when a later file repeats its key.
 */
export function mergeResults(results: Array<Pick<FileLocalization, 'entries'>>): ResourceMap {
  const merged: ResourceMap = new Map();

  for (const result of results) {
    for (const [key, value] of result.entries) {
      if (!merged.has(key)) {
        merged.set(key, value);
      }
    }
  }

  return merged;
}
