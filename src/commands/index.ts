/**
 * Command exports
 */

export { releaseCommand, type ReleaseOptions, type ReleaseCommandDependencies } from './release.js';
export { pluginsCommand, type PluginsOptions } from './plugins.js';
export type { ReleaseDependencies } from './shared.js';
