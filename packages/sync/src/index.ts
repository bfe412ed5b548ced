/**
 * @seedsync/sync
 *
 * The sync engine:
 * - Folder watching and dispatch of torrent descriptors
 * - Transfer registry and lifecycle reconciliation
 * - Retrieval of finished transfers and library import
 * - Periodic task scheduling
 */

// Scheduling
export { PeriodicTask, systemTimers, type PeriodicTaskOptions, type TimerSource } from './scheduler/periodicTask.js';
export { Scheduler, type SchedulerOptions } from './scheduler/scheduler.js';

// Watcher
export {
  FolderWatcher,
  type FolderWatcherConfig,
  type DescriptorDispatcher,
  type DispatchResult,
  type PendingFile,
  type ScanReport,
  type UnreadableFile,
} from './watcher/folderWatcher.js';
export { ProcessedLedger, type DispatchOutcome, type LedgerEntry } from './watcher/processedLedger.js';
export {
  DESCRIPTOR_EXTENSIONS,
  descriptorKind,
  describeFile,
  parseMagnetFile,
  readSubmission,
} from './watcher/descriptor.js';
export {
  WatcherSettingsStore,
  watcherSettingsSchema,
  type WatcherSettings,
} from './watcher/watcherSettingsStore.js';
export {
  WatcherService,
  WATCHER_TASK,
  type WatcherDefaults,
  type WatcherServiceOptions,
  type StartWatcherInput,
  type WatcherStatus,
} from './watcher/watcherService.js';

// Tracking
export { titleKey, TITLE_MATCHING_MODES, type TitleMatching } from './tracker/titles.js';
export { TransferStore, type TransferSnapshot } from './tracker/transferStore.js';
export {
  TransferTracker,
  DEFAULT_HISTORY_LIMIT,
  NOT_FOUND_ON_CLOUD,
  type TransferTrackerOptions,
  type RegisterInput,
  type TransitionDetails,
  type TransitionEvent,
  type RemovedEvent,
  type ReconcileReport,
} from './tracker/transferTracker.js';

// Orchestration
export { FetchRegistry, type FetchTask } from './orchestrator/fetchRegistry.js';
export {
  SyncOrchestrator,
  DEFAULT_MAX_FETCH_RETRIES,
  type SyncOrchestratorOptions,
  type AddTransferInput,
  type RetrievedFiles,
} from './orchestrator/syncOrchestrator.js';
