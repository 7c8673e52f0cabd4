#!/usr/bin/env node
/**
 * release-sync CLI - Reset a version's tags and GitHub releases
 *
 * Commands:
 * - release: Tag and release the repository in the current directory
 * - plugins: Tag and release every repository listed in the targets config
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext } from './types.js';
import { releaseCommand, pluginsCommand } from './commands/index.js';
import { DEFAULT_TARGETS_CONFIG } from './config/targets.js';
import { logger } from './api/logger.js';
import { printResult, error, confirm } from './utils/output.js';

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
    cwd: process.cwd(),
    confirm,
  };
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('release-sync')
  .description('Recreate git tags and GitHub releases for a version')
  .version(VERSION)
  // Global options available to all commands
  .addOption(
    new Option('--dry-run', 'Show what would happen without making changes')
      .default(false)
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-y, --yes', 'Skip confirmation prompts')
      .default(false)
  )
  .addOption(
    new Option('--token <token>', 'GitHub token (default: GITHUB_TOKEN or GH_TOKEN)')
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * release command - Main repository
 */
program
  .command('release')
  .description('Tag and release the repository in the current directory')
  .argument('<version>', 'Version to release, e.g. v1.5.1 or 1.5.1')
  .addOption(
    new Option('--version-file <path>', 'Bump and commit the version recorded in this file before tagging')
      .env('RELEASE_SYNC_VERSION_FILE')
  )
  .option('--version-pattern <regex>', 'Pattern for the version text in the version file (default: trailing v<digits>)')
  .action(async (version: string, cmdOpts: { versionFile?: string; versionPattern?: string }) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      const result = await releaseCommand(ctx, {
        version,
        versionFile: cmdOpts.versionFile,
        versionPattern: cmdOpts.versionPattern,
      });

      if (ctx.outputFormat === 'json') {
        printResult(result, ctx.outputFormat);
      }

      process.exit(result.success ? 0 : 1);
    } catch (err) {
      error(`Release failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

/**
 * plugins command - Configured plugin repositories
 */
program
  .command('plugins')
  .description('Tag and release every plugin in the targets config')
  .argument('<version>', 'Version to release, e.g. v1.5.1 or 1.5.1')
  .addOption(
    new Option('--config <path>', 'Path to the targets config')
      .env('RELEASE_SYNC_CONFIG')
      .default(DEFAULT_TARGETS_CONFIG)
  )
  .option('--plugin <name>', 'Release only this plugin')
  .action(async (version: string, cmdOpts: { config: string; plugin?: string }) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      const result = await pluginsCommand(ctx, {
        version,
        config: cmdOpts.config,
        plugin: cmdOpts.plugin,
      });

      if (ctx.outputFormat === 'json') {
        printResult(result, ctx.outputFormat);
      }

      process.exit(result.success ? 0 : 1);
    } catch (err) {
      error(`Plugins release failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

// Parse and execute
await program.parseAsync();
