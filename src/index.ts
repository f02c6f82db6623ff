export type { LockstepConfig } from "./config.js";
export { DEFAULT_CONFIG, loadConfig } from "./config.js";
export {
  ConfigError,
  CoordinationError,
  LockConflictError,
  LockTimeoutError,
  PreemptedError,
} from "./errors.js";
export type { LockstepPaths } from "./paths.js";
export { getLockstepPaths } from "./paths.js";
export type { HeldLocks, LockRequest, RetryOutcome } from "./state/acquire-retry.js";
export { acquireWithRetry, withLocks } from "./state/acquire-retry.js";
export type { Assignment } from "./state/assign.js";
export { assignQueuedTasks } from "./state/assign.js";
export type { LockMode } from "./state/compatibility.js";
export { areModesCompatible } from "./state/compatibility.js";
export type { DeadlockResolution } from "./state/deadlock.js";
export { runDeadlockPass } from "./state/deadlock.js";
export { ensureStateDirs } from "./state/ensure-state.js";
export type { EventKind, LockstepEvent } from "./state/events.js";
export type { AgentStatus, HeartbeatResult } from "./state/heartbeat.js";
export { heartbeat, markCrashed, registerAgent } from "./state/heartbeat.js";
export type {
  AcquireRequest,
  AcquireResult,
  PreemptResult,
  ReleaseResult,
  RenewResult,
} from "./state/lock-store.js";
export { acquire, checkFence, checkTicket, preempt, query, release, releaseOwned, renew, snapshotLocks } from "./state/lock-store.js";
export type { MetricsSnapshot } from "./state/metrics.js";
export { computeMetrics } from "./state/metrics.js";
export { readEvents } from "./state/read-events.js";
export { readStatuses } from "./state/read-statuses.js";
export type { ReapReport } from "./state/reaper.js";
export { runReaperPass } from "./state/reaper.js";
export type { RoutingDecision } from "./state/routing-policy.js";
export { routeTask } from "./state/routing-policy.js";
export type { TaskClaim } from "./state/task-claim.js";
export {
  claimTask,
  completeTask,
  failTask,
  listFailed,
  requeueTask,
  retryFailed,
  touchClaim,
} from "./state/task-claim.js";
export type { Task, TaskInput } from "./state/tasks.js";
export { enqueue, listQueued } from "./state/tasks.js";
export type { Ticket } from "./state/tickets.js";
