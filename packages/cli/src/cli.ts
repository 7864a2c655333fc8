#!/usr/bin/env node

/**
 * Bakeline CLI — register recipe manifests as pipeline jobs
 *
 * Usage:
 *   bakeline register   Register every recipe in meta.yaml
 *   bakeline check      Decode descriptors and check versions
 *   bakeline history    Show registrations from the local ledger
 */

import { Command } from 'commander';
import { VERSION } from '../../resolver/src/index.js';
import { check } from './commands/check.js';
import { history } from './commands/history.js';
import { register } from './commands/register.js';
import { loadDbPath } from './config.js';

interface RegisterFlags {
  meta: string;
  bakeries: string;
  secrets?: string;
  prune?: boolean;
  db?: string;
}

interface CheckFlags {
  meta: string;
  bakeries: string;
}

interface HistoryFlags {
  recipe?: string;
  db?: string;
  limit?: string;
}

const program = new Command();

program
  .name('bakeline')
  .description('Register recipe manifests as pipeline jobs')
  .version(VERSION);

program
  .command('register')
  .description('Register every recipe in a manifest with the workflow engine')
  .requiredOption('--meta <path>', 'recipe manifest (meta.yaml)')
  .requiredOption('--bakeries <path>', 'bakery table (bakeries.yaml)')
  .option('--secrets <path>', 'JSON file of secret name to value (default: $BAKELINE_SECRETS)')
  .option('--prune', 'register pruned recipes that process only the first inputs')
  .option('--db <path>', 'registration ledger path (default: $BAKELINE_DB)')
  .action(async (flags: RegisterFlags) => {
    console.log('Bakeline: registering recipes...\n');
    const result = await register({
      metaPath: flags.meta,
      bakeriesPath: flags.bakeries,
      secretsPath: flags.secrets,
      prune: flags.prune ?? false,
      dbPath: flags.db,
      onProgress: (line) => console.log(line),
    });
    if (result.ok) {
      console.log(result.report);
    } else {
      console.error(result.report);
      process.exitCode = 1;
    }
  });

program
  .command('check')
  .description('Decode the descriptors and check toolchain versions')
  .requiredOption('--meta <path>', 'recipe manifest (meta.yaml)')
  .requiredOption('--bakeries <path>', 'bakery table (bakeries.yaml)')
  .action((flags: CheckFlags) => {
    const result = check({ metaPath: flags.meta, bakeriesPath: flags.bakeries });
    if (result.ok) {
      console.log(result.report);
    } else {
      console.error(result.report);
      process.exitCode = 1;
    }
  });

program
  .command('history')
  .description('Show registrations from the local ledger')
  .option('--recipe <id>', 'only this recipe')
  .option('--limit <n>', 'number of registrations to show')
  .option('--db <path>', 'registration ledger path (default: $BAKELINE_DB)')
  .action((flags: HistoryFlags) => {
    const limit = flags.limit === undefined ? undefined : Number.parseInt(flags.limit, 10);
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      console.error(`Invalid --limit: ${flags.limit}`);
      process.exitCode = 1;
      return;
    }
    const result = history({ dbPath: flags.db ?? loadDbPath(process.env), recipeId: flags.recipe, limit });
    console.log(result.report);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('bakeline error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
