/**
 * @reposnap/core
 *
 * Shared building blocks for the snapshot tools: errors, logging, configuration,
 * the version-control capability, the snapshot counter, archives and pruning.
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Configuration
export * from './config/config.js';

// Version control
export { GitClient, spawnCommand, type GitClientOptions } from './git/git-client.js';

// Counter
export { CounterStore, DEFAULT_COUNTER_LOCK, type CounterStoreConfig } from './counter/counter-store.js';

// Archives
export {
  createArchive,
  collectArchiveEntries,
  listArchiveEntries,
  type CreateArchiveOptions,
  type ArchiveFileEntry,
} from './archive/archive-utils.js';

// Pruning
export {
  pruneSnapshots,
  listNumberedSnapshots,
  numberedSnapshotName,
  numberedSnapshotPattern,
  DEFAULT_KEEP,
  type NumberedSnapshot,
  type PruneOptions,
  type PruneResult,
  type PruneFailure,
} from './prune/prune-snapshots.js';

// Utils
export { createLogger, silentLogger, type Logger } from './utils/logger.js';
export { formatTimestamp } from './utils/timestamp.js';
export { runCli, scriptFileName } from './utils/cli.js';
