/**
 * plugins command - Tag and release every configured plugin repository
 *
 * Targets come from the targets config (default: plugins.json). Each
 * plugin is processed in file order; one failing plugin does not stop
 * the others.
 */

import chalk from 'chalk';
import type { CommandContext, CommandResult } from '../types.js';
import { formatRepository } from '../git/repo.js';
import { loadTargetsConfig, selectTargets, DEFAULT_TARGETS_CONFIG } from '../config/targets.js';
import { normalizeVersion } from '../reconcilers/release/version.js';
import { runRelease } from '../reconcilers/release/orchestrate.js';
import type { RunReport, Target } from '../reconcilers/release/types.js';
import { dryRunNotice, header, info, verbose } from '../utils/output.js';
import {
  buildCollaborators,
  cancelled,
  failureResult,
  finishRun,
  resolveToken,
  type ReleaseDependencies,
} from './shared.js';

export interface PluginsOptions {
  /** Version to release, with or without the leading "v" */
  version: string;
  /** Path to the targets config */
  config?: string;
  /** Release only the plugin with this name */
  plugin?: string;
}

/**
 * Execute the plugins command
 */
export async function pluginsCommand(
  ctx: CommandContext,
  options: PluginsOptions,
  deps: ReleaseDependencies = {}
): Promise<CommandResult<RunReport>> {
  const { options: globalOpts, outputFormat } = ctx;
  const human = outputFormat === 'human';

  verbose('Executing plugins command', globalOpts.verbose);

  let tag: string;
  let targets: Target[];
  try {
    tag = normalizeVersion(options.version).tag;
    const loaded = await loadTargetsConfig(options.config ?? DEFAULT_TARGETS_CONFIG, ctx.cwd);
    verbose(`Loaded ${loaded.configPath} (root: ${loaded.root})`, globalOpts.verbose);
    targets = selectTargets(loaded.targets, options.plugin).map((target) => ({
      ...target,
      releaseBody: target.releaseBody ?? `Release ${tag} for ${target.name}`,
      lightweightTag: true,
    }));
  } catch (err) {
    return failureResult(ctx, err);
  }

  if (human) {
    header(`Release ${tag}`);
    info(`${targets.length} plugin(s):`);
    for (const target of targets) {
      console.log(`  ${target.name} ${chalk.gray(`-> ${formatRepository(target.repository)}`)}`);
    }
  }

  const token = resolveToken(ctx);

  if (!globalOpts.dryRun && !globalOpts.yes) {
    const proceed = await ctx.confirm(
      `Create tag ${tag} and release it for ${targets.length} plugin(s)?`
    );
    if (!proceed) {
      return cancelled(ctx);
    }
  }

  if (globalOpts.dryRun && human) {
    dryRunNotice();
  }

  const collaborators = buildCollaborators(ctx, token, deps);
  const report = await runRelease(tag, targets, collaborators, {
    dryRun: globalOpts.dryRun,
    onTargetStart: human
      ? (target, index, total) => info(`[${index + 1}/${total}] ${target.name}`)
      : undefined,
  });

  return finishRun(ctx, report, targets, token === null);
}
