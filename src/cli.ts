#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import path from 'path';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { readFile, readdir } from 'fs/promises';

import { localizeProject, BASE_LOCALE, I18N_DIR } from './core/project.js';
import { readResourceFile, getCoverage, findMissing } from './core/resources.js';
import { DEFAULT_LANGUAGES } from './core/translator.js';
import { DEFAULT_EXCLUDE, DEFAULT_INCLUDE } from './core/extractor.js';
import { createOpenAIPlugin } from './plugins/openai.js';
import type { Reporter } from './plugins/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Try to read package.json for version
async function getVersion(): Promise<string> {
  try {
    const content = await readFile(path.join(__dirname, '../package.json'), 'utf-8');
    const pkg: unknown = JSON.parse(content);
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '1.0.0';
  } catch {
    return '1.0.0';
  }
}

function splitList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

interface RunOptions {
  source: string;
  include: string;
  exclude: string;
  languages: string;
  dialects?: string;
  namespace?: string;
  descriptor: string;
  openaiApiKey?: string;
  model?: string;
  skipTranslate?: boolean;
  dryRun?: boolean;
}

/**
 * Main CLI function
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const version = await getVersion();
  const program = new Command();

  program
    .name('localize-extract')
    .description('Externalize UI text into localization calls and generate translated resource files')
    .version(version);

  program
    .command('run', { isDefault: true })
    .description('Extract text, rewrite sources, write en.js and translate it')
    .argument('[root]', 'Project root', '.')
    .option('-s, --source <dir>', 'Source directory, relative to the root', 'src')
    .option('-i, --include <pattern>', 'Include pattern', DEFAULT_INCLUDE)
    .option('-e, --exclude <patterns>', 'Exclude patterns', DEFAULT_EXCLUDE.join(','))
    .option('-l, --languages <codes>', 'Comma separated base languages', DEFAULT_LANGUAGES.join(','))
    .option('-d, --dialects <codes>', 'Comma separated dialects (e.g. fr-CA,de-AT); defaults apply for known languages')
    .option('--namespace <id>', 'Key namespace (default: project identifier)')
    .option('--descriptor <file>', 'Project descriptor, relative to the root', 'package.json')
    .option('--openai-api-key <key>', 'OpenAI API key (or set OPENAI_API_KEY)')
    .option('--model <name>', 'OpenAI model (or set OPENAI_MODEL)')
    .option('--skip-translate', 'Only extract and write the base locale')
    .option('--dry-run', 'Preview changes without writing')
    .action(async (root: string, options: RunOptions) => {
      const spinner = ora('Extracting UI text...').start();
      const warnings: string[] = [];
      const written: string[] = [];

      const reporter: Reporter = {
        progress: progress => {
          spinner.text = `Processing ${path.basename(progress.file)} (${progress.current}/${progress.total})`;
        },
        warn: message => {
          warnings.push(message);
        },
        written: file => {
          written.push(file);
          spinner.text = `Written ${path.basename(file)}`;
        }
      };

      try {
        const startTime = Date.now();
        let provider = options.skipTranslate
          ? undefined
          : createOpenAIPlugin({ apiKey: options.openaiApiKey, model: options.model });

        if (provider && !provider.isAvailable()) {
          warnings.push('OpenAI API key is not configured. Set --openai-api-key or OPENAI_API_KEY.');
          provider = undefined;
        }

        const result = await localizeProject({
          root,
          source: options.source,
          include: options.include,
          exclude: splitList(options.exclude),
          namespace: options.namespace,
          descriptor: options.descriptor,
          languages: splitList(options.languages),
          dialects: options.dialects === undefined ? undefined : splitList(options.dialects),
          provider,
          dryRun: options.dryRun,
          reporter
        });

        spinner.succeed(options.dryRun ? 'Dry run complete' : `Localization complete at ${new Date().toISOString()}`);

        const changed = result.files.filter(file => file.changed);
        if (options.dryRun) {
          console.log(chalk.cyan('\nFiles that would change:'));
          changed.forEach(file => console.log(chalk.green(`  ~ ${path.relative(root, file.file)}`)));
          console.log(chalk.cyan('\nBase locale entries:'));
          result.base.forEach((value, key) => console.log(chalk.green(`  + ${key}: ${value.value}`)));
        } else {
          written.forEach(file => console.log(chalk.green(`  ✓ ${path.relative(root, file)}`)));
        }

        warnings.forEach(message => console.warn(chalk.yellow(`  ! ${message}`)));

        const duration = Date.now() - startTime;
        console.log(chalk.cyan(`\n✓ Namespace: ${result.namespace}`));
        console.log(chalk.cyan(`✓ Scanned ${result.files.length} files, rewrote ${changed.length}`));
        console.log(chalk.cyan(`✓ ${result.base.size} base entries, ${result.outputs.length} translated files`));
        console.log(chalk.cyan(`✓ Time: ${(duration / 1000).toFixed(1)}s`));
      } catch (error) {
        spinner.fail('Localization failed');
        console.error(chalk.red(error instanceof Error ? error.message : String(error)));
        process.exit(1);
      }
    });

  // Status command
  program
    .command('status')
    .description('Show translation coverage of each language file against en.js')
    .argument('[dir]', 'Resource directory', path.join('src', I18N_DIR))
    .action(async (dir: string) => {
      try {
        const sourceData = await readResourceFile(path.join(dir, `${BASE_LOCALE}.js`));
        const targets = (await readdir(dir))
          .filter(file => /^[a-z]{2,3}\.js$/.test(file) && file !== `${BASE_LOCALE}.js`)
          .sort();

        console.log(chalk.cyan(`\nTranslation Coverage Report`));
        console.log(chalk.cyan(`Source: ${BASE_LOCALE}.js (${sourceData.size} keys)\n`));

        for (const target of targets) {
          const targetData = await readResourceFile(path.join(dir, target));
          const coverage = getCoverage(sourceData, targetData);

          const bar = '█'.repeat(Math.floor(coverage.percentage / 5)) +
                      '░'.repeat(20 - Math.floor(coverage.percentage / 5));

          const color = coverage.percentage >= 90 ? chalk.green :
                       coverage.percentage >= 70 ? chalk.yellow :
                       chalk.red;

          console.log(`${target}:`);
          console.log(`  ${bar} ${color(coverage.percentage + '%')}`);
          console.log(`  ${coverage.translated}/${coverage.total} translated, ${coverage.missing} missing`);
          findMissing(sourceData, targetData).forEach(key => console.log(chalk.yellow(`    - ${key}`)));
          console.log('');
        }
      } catch (error) {
        console.error(chalk.red(error instanceof Error ? error.message : String(error)));
        process.exit(1);
      }
    });

  await program.parseAsync(argv);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === realpathSync(__filename);
  } catch {
    return false;
  }
}

// Run main if this is the entry point
if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exit(1);
  });
}
