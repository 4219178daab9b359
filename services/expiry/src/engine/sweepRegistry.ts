import type { SweepJob } from './sweep';

/** Keeps sweep jobs reachable by id so callers can poll or cancel them. */
export class SweepRegistry {
  private readonly jobs = new Map<string, SweepJob>();

  constructor(private readonly retainFinished = 50) {}

  add(job: SweepJob): SweepJob {
    this.jobs.set(job.id, job);
    this.prune();
    return job;
  }

  get(id: string): SweepJob | undefined {
    return this.jobs.get(id);
  }

  list(): SweepJob[] {
    return [...this.jobs.values()];
  }

  /** Cancels every running job and waits for all of them to settle. */
  async cancelAll(): Promise<void> {
    const running = this.list().filter((job) => job.state === 'running');
    for (const job of running) job.cancel('shutdown');
    await Promise.all(running.map((job) => job.done));
  }

  private prune(): void {
    const finished = this.list().filter((job) => job.state !== 'running');
    const excess = finished.length - this.retainFinished;
    // Map iteration is insertion order, so the oldest finished jobs go first
    for (const job of finished.slice(0, Math.max(0, excess))) this.jobs.delete(job.id);
  }
}
