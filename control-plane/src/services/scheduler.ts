/**
 * Decides where the long-running execution step runs. The orchestrator
 * never inspects the environment to pick one; the caller injects it.
 */
export interface Scheduler {
  schedule<T>(task: () => Promise<T>): Promise<T>;
}

/** Defers the task to a later macrotask so the caller's chain returns first. */
export class BackgroundScheduler implements Scheduler {
  schedule<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      setImmediate(() => {
        task().then(resolve, reject);
      });
    });
  }
}

/** Runs the task directly on the caller's chain, in call order. */
export class ImmediateScheduler implements Scheduler {
  schedule<T>(task: () => Promise<T>): Promise<T> {
    return task();
  }
}

export type SchedulerKind = "background" | "immediate";

export function createScheduler(kind: SchedulerKind): Scheduler {
  return kind === "immediate" ? new ImmediateScheduler() : new BackgroundScheduler();
}
