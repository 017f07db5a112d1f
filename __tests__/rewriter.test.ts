import { describe, test, expect } from 'vitest';
import {
  rewriteSource,
  wrapTemplate,
  ensureLocalizationImport,
  ensureLocaleUpdates
} from '../src/core/rewriter.js';
import type { PlainReplacement, TemplateLocalization } from '../src/plugins/types.js';

/** Replacement for the first occurrence of a quoted literal at or after `from` */
function plain(code: string, literal: string, key: string, from = 0): PlainReplacement {
  const start = code.indexOf(literal, from);
  return {
    raw: literal.slice(1, -1),
    quote: literal.startsWith('"') ? '"' : "'",
    key,
    start,
    end: start + literal.length
  };
}

function templateIn(code: string, template: Omit<TemplateLocalization, 'start' | 'end'>): TemplateLocalization {
  const start = code.indexOf(template.literal);
  return { ...template, start, end: start + template.literal.length };
}

const card = [
  "import { LitElement, html } from 'lit';",
  '',
  'export class MyCard extends LitElement {',
  '  constructor() {',
  '    super();',
  "    this.title = 'Hello world';",
  '  }',
  '}'
].join('\n');

const greeting: Omit<TemplateLocalization, 'start' | 'end'> = {
  literal: '`Hello ${this.user.name}, you have ${this.count} items`',
  numbered: 'Hello {0}, you have {1} items',
  codeTemplate: 'Hello ${placeholder0}, you have ${placeholder1} items',
  expressions: ['this.user.name', 'this.count'],
  key: 'ext-hello_you_have_items',
  indent: '    '
};

describe('Rewriter - Source Transformation', () => {
  describe('plain literals', () => {
    test('wraps literals, adds the import and the subscription', () => {
      const result = rewriteSource(card, [plain(card, "'Hello world'", 'ext-hello_world')], []);

      expect(result).toBe([
        "import { LitElement, html } from 'lit';",
        "import { msg, updateWhenLocaleChanges } from 'localization';",
        '',
        'export class MyCard extends LitElement {',
        '  constructor() {',
        '    super();',
        '    updateWhenLocaleChanges(this);',
        "    this.title = msg('Hello world', { id: 'ext-hello_world' });",
        '  }',
        '}'
      ].join('\n'));
    });

    test('is idempotent', () => {
      const replacements = [plain(card, "'Hello world'", 'ext-hello_world')];
      const once = rewriteSource(card, replacements, []);
      expect(rewriteSource(once, replacements, [])).toBe(once);
    });

    test('wraps each given occurrence with its key, keeping the quote style', () => {
      const code = "const a = 'Save changes';\nconst b = \"Save changes\";";
      const result = rewriteSource(code, [
        plain(code, "'Save changes'", 'ext-save_changes'),
        plain(code, '"Save changes"', 'ext-save_changes')
      ], []);

      expect(result).toBe([
        "import { msg, updateWhenLocaleChanges } from 'localization';",
        "const a = msg('Save changes', { id: 'ext-save_changes' });",
        "const b = msg(\"Save changes\", { id: 'ext-save_changes' });"
      ].join('\n'));
    });

    test('only rewrites the occurrence at the given offsets', () => {
      const code = [
        "this.label = 'Save changes';",
        'const view = html`<button title="Save changes"></button>`;'
      ].join('\n');

      const result = rewriteSource(code, [plain(code, "'Save changes'", 'ext-save_changes')], []);

      expect(result).toBe([
        "import { msg, updateWhenLocaleChanges } from 'localization';",
        "this.label = msg('Save changes', { id: 'ext-save_changes' });",
        'const view = html`<button title="Save changes"></button>`;'
      ].join('\n'));
    });

    test('skips occurrences that are already wrapped', () => {
      const code = "const a = msg('Save changes', { id: 'ext-save_changes' });\nconst b = 'Save changes';";
      const result = rewriteSource(code, [
        plain(code, "'Save changes'", 'ext-save_changes'),
        plain(code, "'Save changes'", 'ext-save_changes', 40)
      ], []);

      expect(result).toBe([
        "import { msg, updateWhenLocaleChanges } from 'localization';",
        "const a = msg('Save changes', { id: 'ext-save_changes' });",
        "const b = msg('Save changes', { id: 'ext-save_changes' });"
      ].join('\n'));
    });

    test('leaves files untouched when the offsets no longer match', () => {
      const code = 'const a = 1;\n';
      const stale: PlainReplacement = { raw: 'Not present', quote: "'", key: 'ext-x', start: 0, end: 13 };
      expect(rewriteSource(code, [stale], [])).toBe(code);
    });
  });

  describe('template literals', () => {
    test('builds a self-invoking wrapper', () => {
      expect(wrapTemplate(greeting)).toBe([
        '(() => {',
        '        const placeholder0 = this.user.name;',
        '        const placeholder1 = this.count;',
        "        return msg(str`Hello ${placeholder0}, you have ${placeholder1} items`, { id: 'ext-hello_you_have_items' });",
        '    })()'
      ].join('\n'));
    });

    test('rewrites templates and imports the tag', () => {
      const code = [
        'export class Greeter {',
        '  constructor() {',
        '    this.label = `Hello ${this.user.name}, you have ${this.count} items`;',
        '  }',
        '}'
      ].join('\n');

      const template = templateIn(code, greeting);
      const result = rewriteSource(code, [], [template]);

      expect(result).toBe([
        "import { msg, str, updateWhenLocaleChanges } from 'localization';",
        'export class Greeter {',
        '  constructor() {',
        '    updateWhenLocaleChanges(this);',
        '    this.label = (() => {',
        '        const placeholder0 = this.user.name;',
        '        const placeholder1 = this.count;',
        "        return msg(str`Hello ${placeholder0}, you have ${placeholder1} items`, { id: 'ext-hello_you_have_items' });",
        '    })();',
        '  }',
        '}'
      ].join('\n'));
      expect(rewriteSource(result, [], [template])).toBe(result);
    });

    test('wraps literals inside placeholders in the bound expression', () => {
      const code = "const note = `Status: ${ok ? 'All good here' : 'Needs attention'} now`;";
      const template = templateIn(code, {
        literal: "`Status: ${ok ? 'All good here' : 'Needs attention'} now`",
        numbered: 'Status: {0} now',
        codeTemplate: 'Status: ${placeholder0} now',
        expressions: ["ok ? 'All good here' : 'Needs attention'"],
        key: 'ext-status_now',
        indent: ''
      });

      const result = rewriteSource(code, [
        plain(code, "'All good here'", 'ext-all_good_here'),
        plain(code, "'Needs attention'", 'ext-needs_attention')
      ], [template]);

      expect(result).toBe([
        "import { msg, str, updateWhenLocaleChanges } from 'localization';",
        'const note = (() => {',
        "    const placeholder0 = ok ? msg('All good here', { id: 'ext-all_good_here' }) : msg('Needs attention', { id: 'ext-needs_attention' });",
        "    return msg(str`Status: ${placeholder0} now`, { id: 'ext-status_now' });",
        '})();'
      ].join('\n'));
    });
  });

  describe('ensureLocalizationImport', () => {
    test('extends an existing import in place', () => {
      const code = "import { LitElement } from 'lit';\nimport { msg } from \"localization\";\nconst a = 1;";
      expect(ensureLocalizationImport(code, true)).toBe(
        "import { LitElement } from 'lit';\nimport { msg, str, updateWhenLocaleChanges } from 'localization';\nconst a = 1;"
      );
    });

    test('keeps an import that already has every helper', () => {
      const code = "import { msg, str, updateWhenLocaleChanges, configureLocalization } from 'localization';";
      expect(ensureLocalizationImport(code, true)).toBe(code);
      expect(ensureLocalizationImport(code, false)).toBe(code);
    });

    test('replaces a namespace import from the helper module', () => {
      const code = "import { LitElement } from 'lit';\nimport * as l10n from 'localization';\nconst a = 1;";
      expect(ensureLocalizationImport(code, false)).toBe(
        "import { LitElement } from 'lit';\nimport { msg, updateWhenLocaleChanges } from 'localization';\nconst a = 1;"
      );
    });

    test('keeps a default binding from the helper module', () => {
      const code = "import l10n from 'localization';\nconst a = 1;";
      expect(ensureLocalizationImport(code, true)).toBe(
        "import l10n, { msg, str, updateWhenLocaleChanges } from 'localization';\nconst a = 1;"
      );
    });

    test('inserts after the last import statement', () => {
      const code = "import a from 'a';\nimport {\n  b,\n  c\n} from 'bc';\n\nrun();";
      expect(ensureLocalizationImport(code, false)).toBe(
        "import a from 'a';\nimport {\n  b,\n  c\n} from 'bc';\nimport { msg, updateWhenLocaleChanges } from 'localization';\n\nrun();"
      );
    });

    test('inserts at the top without imports', () => {
      expect(ensureLocalizationImport('run();', false)).toBe(
        "import { msg, updateWhenLocaleChanges } from 'localization';\nrun();"
      );
    });
  });

  describe('ensureLocaleUpdates', () => {
    test('does nothing without a constructor', () => {
      const code = 'class A {\n  render() {}\n}';
      expect(ensureLocaleUpdates(code)).toBe(code);
    });

    test('indents inside an empty constructor', () => {
      expect(ensureLocaleUpdates('class A {\n  constructor() {\n  }\n}')).toBe(
        'class A {\n  constructor() {\n    updateWhenLocaleChanges(this);\n  }\n}'
      );
    });

    test('inserts after a super call with nested parentheses', () => {
      const code = [
        'class Panel extends LitElement {',
        '  constructor(opts = defaults()) {',
        '    super(merge(opts, { mode: "(compact)" }));',
        "    this.title = 'Hello world';",
        '  }',
        '}'
      ].join('\n');

      expect(ensureLocaleUpdates(code)).toBe([
        'class Panel extends LitElement {',
        '  constructor(opts = defaults()) {',
        '    super(merge(opts, { mode: "(compact)" }));',
        '    updateWhenLocaleChanges(this);',
        "    this.title = 'Hello world';",
        '  }',
        '}'
      ].join('\n'));
    });

    test('does not add a second subscription', () => {
      const code = 'class A {\n  constructor() {\n    updateWhenLocaleChanges(this);\n  }\n}';
      expect(ensureLocaleUpdates(code)).toBe(code);
    });
  });
});
