/**
 * @reposnap/cli
 *
 * Counter-based and timestamp-based project snapshots.
 */

export {
  runCounterSnapshot,
  counterCommitMessage,
  type CounterSnapshotOptions,
  type CounterSnapshotResult,
} from './counter-snapshot.js';

export {
  runTimestampSnapshot,
  timestampCommitMessage,
  timestampSnapshotName,
  type TimestampSnapshotOptions,
  type TimestampSnapshotResult,
} from './timestamp-snapshot.js';

export { parseCounterArgs, parseSaveArgs, type ParsedCounterArgs, type ParsedSaveArgs } from './args.js';
