import type { LocalizationConventions } from '../plugins/types.js';

export const DEFAULT_CONVENTIONS: LocalizationConventions = {
  callName: 'msg',
  tagName: 'str',
  subscribeName: 'updateWhenLocaleChanges',
  importSource: 'localization',
  resourceTagSource: '@lit/localize'
};

/**
 * Escape a string for use inside a RegExp
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Pattern matching an existing localization call opening on a quoted string, e.g. `msg('`
 */
export function localizationCallPattern(conventions: LocalizationConventions): RegExp {
  return new RegExp(`${escapeRegExp(conventions.callName)}\\s*\\(\\s*['"]`);
}
