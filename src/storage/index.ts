/**
 * Storage Module Exports
 *
 * Crash-safe files and the registry snapshot stores built on them.
 */

export { AtomicStorage, ChecksummedFile, ReadResult, ShapeGuard } from './atomic-storage';
export {
  FileSnapshotStore,
  MemorySnapshotStore,
  RegistrySnapshot,
  SnapshotError,
  SnapshotStore,
  SNAPSHOT_FILE,
  SNAPSHOT_VERSION,
  isRegistrySnapshot,
} from './registry-snapshot';
