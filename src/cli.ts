/**
 * platform-release CLI - Release tagging and platform aggregation
 *
 * Commands:
 * - tags enforce: keep `latest` on the highest production version
 * - tags rollback: quarantine a rolled-back version and promote a replacement
 * - tags plan: show what enforce would change
 * - aggregate: build a platform manifest from production versions
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext, CommandResult } from './types.js';
import { EXIT_FAILURE, EXIT_SUCCESS } from './types.js';
import { enforceCommand, rollbackCommand, planCommand, aggregateCommand } from './commands/index.js';
import { printResult, error } from './utils/output.js';
import { logger } from './api/logger.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
  }

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
  };
}

/**
 * Print a result (JSON mode only; human output is printed by the command)
 * and exit with its code
 */
function finish<T>(ctx: CommandContext, result: CommandResult<T>): never {
  if (ctx.outputFormat === 'json') {
    printResult(result);
  }
  process.exit(result.exitCode ?? (result.success ? EXIT_SUCCESS : EXIT_FAILURE));
}

function fail(label: string, err: unknown): never {
  error(`${label} failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(EXIT_FAILURE);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('platform-release')
  .description('Release tagging and platform aggregation for the Trust Registry')
  .version(VERSION)
  // Global options available to all commands
  .addOption(new Option('--base-url <url>', 'Trust Registry base URL'))
  .addOption(new Option('--token <token>', 'Registry access token'))
  .addOption(
    new Option('--dry-run', 'Show what would happen without making changes')
      .default(false)
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  )
  .addOption(new Option('--timeout <ms>', 'Request timeout in milliseconds'));

/**
 * tags commands - latest/quarantine management
 */
const tags = program
  .command('tags')
  .description('Manage latest and quarantine tags of an application');

tags
  .command('enforce')
  .description('Move latest to the highest non-quarantined production version')
  .argument('<app-key>', 'Application key')
  .action(async (appKey: string) => {
    const ctx = createContext(program.opts<GlobalOptions>());
    try {
      finish(ctx, await enforceCommand(ctx, appKey));
    } catch (err) {
      fail('Enforce', err);
    }
  });

tags
  .command('rollback')
  .description('Quarantine a rolled-back version and promote a replacement to latest')
  .argument('<app-key>', 'Application key')
  .argument('<version>', 'Version that was rolled back')
  .action(async (appKey: string, version: string) => {
    const ctx = createContext(program.opts<GlobalOptions>());
    try {
      finish(ctx, await rollbackCommand(ctx, appKey, version));
    } catch (err) {
      fail('Rollback', err);
    }
  });

tags
  .command('plan')
  .description('Show current tags and the changes enforce would make')
  .argument('<app-key>', 'Application key')
  .action(async (appKey: string) => {
    const ctx = createContext(program.opts<GlobalOptions>());
    try {
      finish(ctx, await planCommand(ctx, appKey));
    } catch (err) {
      fail('Plan', err);
    }
  });

interface AggregateCliOptions {
  config: string;
  outputDir: string;
  sourceStage: string;
  platformApp: string;
  preview?: boolean;
  override: string[];
}

/**
 * aggregate command - build the platform manifest
 */
program
  .command('aggregate')
  .description('Build a platform manifest from the production versions of all services')
  .option('--config <path>', 'Path to services.yaml', 'config/services.yaml')
  .option('--output-dir <dir>', 'Directory for the manifest file', 'manifests')
  .addOption(
    new Option('--source-stage <stage>', 'Stage to source versions from')
      .choices(['PROD'])
      .default('PROD')
  )
  .addOption(
    new Option('--platform-app <key>', 'Application key of the platform application')
      .env('PLATFORM_APP_KEY')
      .default('platform')
  )
  .option('--preview', 'Print the summary without writing or creating anything')
  .option('--override <service=version>', 'Pin a service version (repeatable)', collect, [])
  .action(async (cmdOpts: AggregateCliOptions) => {
    const ctx = createContext(program.opts<GlobalOptions>());
    try {
      finish(
        ctx,
        await aggregateCommand(ctx, {
          config: cmdOpts.config,
          outputDir: cmdOpts.outputDir,
          sourceStage: cmdOpts.sourceStage,
          platformApp: cmdOpts.platformApp,
          preview: cmdOpts.preview,
          override: cmdOpts.override,
        })
      );
    } catch (err) {
      fail('Aggregate', err);
    }
  });

// Parse and execute
program.parseAsync().catch((err: unknown) => fail('platform-release', err));
