import {
  DEFAULT_BATCH_CONCURRENCY,
  type TaskStatus,
  type UserId,
} from '@tasksync/protocol';
import { ConcurrencyLimiter } from './concurrency-limiter.js';
import { ErrorClassifier } from './error-classifier.js';
import { TaskSyncError, cancelledError } from './errors.js';
import { SyncBus } from './events.js';

/**
 * Count a candidate's open tasks. Implementations run their own retries
 * and reject with a TaskSyncError once they give up.
 */
export type CountOpenTasks = (
  candidate: UserId,
  openStatuses: readonly TaskStatus[],
  signal?: AbortSignal,
) => Promise<number>;

export type CandidateLoad =
  | { candidate: UserId; position: number; count: number }
  | { candidate: UserId; position: number; error: TaskSyncError };

export interface BalanceOptions {
  countOpenTasks: CountOpenTasks;
  /** Parallel count queries */
  concurrency?: number;
  signal?: AbortSignal;
  bus?: SyncBus;
  classifier?: ErrorClassifier;
}

/**
 * A candidate whose count could not be obtained for transient reasons is
 * left out of the comparison. Errors that point at the caller's input or
 * rights are not.
 */
function isExcludable(error: TaskSyncError): boolean {
  if (error.kind === 'RetryBudgetExceeded') return true;
  return error.kind === 'NotFound' && error.resource === 'user';
}

/** Distinct candidates in first-seen order */
function distinct(candidates: readonly UserId[]): UserId[] {
  return [...new Set(candidates)];
}

/**
 * Measure every candidate's open-task count, in candidate order.
 * Failed counts are reported per candidate rather than thrown.
 */
export async function measureLoads(
  candidates: readonly UserId[],
  openStatuses: readonly TaskStatus[],
  options: BalanceOptions,
): Promise<CandidateLoad[]> {
  const { countOpenTasks, signal } = options;
  const bus = options.bus ?? new SyncBus();
  const classifier = options.classifier ?? new ErrorClassifier();
  const limiter = new ConcurrencyLimiter(options.concurrency ?? DEFAULT_BATCH_CONCURRENCY);

  return Promise.all(
    distinct(candidates).map((candidate, position) =>
      limiter.run(async (): Promise<CandidateLoad> => {
        if (signal?.aborted) {
          return { candidate, position, error: cancelledError(signal.reason) };
        }
        try {
          const count = await countOpenTasks(candidate, openStatuses, signal);
          bus.emitBalanceLoad(candidate, count);
          return { candidate, position, count };
        } catch (err) {
          const error = classifier.classifyThrown(err, 'user');
          bus.emitBalanceLoad(candidate, undefined, error.kind);
          return { candidate, position, error };
        }
      }),
    ),
  );
}

/**
 * Workload Balancer — pick the candidate with the fewest open tasks.
 *
 * Ties go to the candidate listed first. Read-only: assigning work is a
 * separate call by the caller, so the choice reflects load at the time
 * of the query and balance is eventual, not strict.
 */
export async function selectLeastLoaded(
  candidates: readonly UserId[],
  openStatuses: readonly TaskStatus[],
  options: BalanceOptions,
): Promise<UserId> {
  const bus = options.bus ?? new SyncBus();
  if (candidates.length === 0) {
    throw new TaskSyncError('InvalidParameter', 'selectLeastLoaded needs at least one candidate');
  }

  const loads = await measureLoads(candidates, openStatuses, { ...options, bus });
  if (options.signal?.aborted) throw cancelledError(options.signal.reason);

  let best: { candidate: UserId; count: number } | undefined;
  const excluded: TaskSyncError[] = [];

  for (const load of loads) {
    if ('error' in load) {
      if (!isExcludable(load.error)) throw load.error;
      excluded.push(load.error);
      bus.emitLog('warn', `candidate ${load.candidate} excluded: ${load.error.message}`, 'balancer');
      continue;
    }
    if (best === undefined || load.count < best.count) {
      best = { candidate: load.candidate, count: load.count };
    }
  }

  if (best === undefined) {
    throw new TaskSyncError('AllCandidatesUnavailable', `No open-task count available for any of ${loads.length} candidate(s)`, {
      cause: excluded,
    });
  }

  bus.emitLog('info', `selected ${best.candidate} with ${best.count} open task(s)`, 'balancer');
  return best.candidate;
}
