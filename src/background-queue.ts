import { normalizeError, type Logger } from "./logger";

export type BackgroundTask = () => void | Promise<void>;

/**
 * Detached work that the submitter never waits for. Tasks start on the next
 * turn of the event loop; a failing task is logged and does not affect any
 * other task or the caller.
 */
export class BackgroundQueue {
  private readonly logger: Logger;
  private readonly pending = new Set<Promise<void>>();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  get size(): number {
    return this.pending.size;
  }

  submit(label: string, task: BackgroundTask): void {
    const run = new Promise<void>((resolve) => {
      setImmediate(resolve);
    })
      .then(task)
      .catch((error: unknown) => {
        this.logger.error("background_task_failed", { task: label, ...normalizeError(error) });
      })
      .finally(() => {
        this.pending.delete(run);
      });
    this.pending.add(run);
  }

  /** Resolves once every task submitted so far has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
