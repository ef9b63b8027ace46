/**
 * Sync engine
 */

export { probe, resolveProbeTarget, type ProbeTarget, type Prober } from "./probe.js";
export {
  GitCli,
  GitCommandError,
  buildGitEnv,
  type GitClient,
  type GitCliOptions,
  type GitResult,
  type RebaseResult,
  type RemoteBranchState,
} from "./git.js";
export { redactCredentials } from "./redact.js";
export {
  SYNC_OUTCOME_KINDS,
  describeOutcome,
  formatEntryResult,
  formatSummary,
  hasFailures,
  summaryExitCode,
  type CycleSummary,
  type EntrySyncResult,
  type SyncOutcome,
  type SyncOutcomeKind,
  type SyncStep,
} from "./outcome.js";
export { renderCommitMessage, syncEntry, type OperatorContext } from "./operator.js";
export { runCycle, type CycleOptions } from "./cycle.js";
export {
  acquireInstanceLock,
  getLockPath,
  isProcessAlive,
  readLockHolder,
  withInstanceLock,
  type InstanceLock,
  type LockHolder,
} from "./lock.js";
export {
  createChangeWatcher,
  isIgnored,
  DEFAULT_IGNORE,
  type ChangeWatcher,
  type ChangeWatcherOptions,
} from "./watcher.js";
export {
  createSleeper,
  effectiveIntervalMinutes,
  getDaemonLogPath,
  getDaemonStatus,
  getPidFilePath,
  installShutdownHandlers,
  readDaemonState,
  removeDaemonState,
  rotateLog,
  runContinuous,
  runScheduler,
  startDaemonBackground,
  stopDaemon,
  syncOnce,
  writeDaemonState,
  type DaemonState,
  type DaemonStatus,
  type RunMode,
  type RunOptions,
  type RunResult,
  type SchedulerOptions,
  type Sleeper,
  type StopResult,
} from "./daemon.js";
