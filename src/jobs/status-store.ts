export type JobRunStatus = "idle" | "running" | "succeeded" | "failed";

export interface JobStatus {
  name: string;
  schedule: string;
  status: JobRunStatus;
  lastRun: string | null;
  durationMs?: number;
  error?: string;
}

/**
 * Last-run status of each scheduled job, kept for the lifetime of the process.
 */
export class JobStatusStore {
  #jobs = new Map<string, JobStatus>();

  register(name: string, schedule: string): JobStatus {
    const job: JobStatus = { name, schedule, status: "idle", lastRun: null };
    this.#jobs.set(name, job);
    return job;
  }

  markRunning(name: string, startedAt: Date): void {
    this.#update(name, { status: "running", lastRun: startedAt.toISOString(), error: undefined });
  }

  markRun(
    name: string,
    status: "succeeded" | "failed",
    details: { durationMs: number; error?: string },
  ): void {
    this.#update(name, { status, durationMs: details.durationMs, error: details.error });
  }

  get(name: string): JobStatus | undefined {
    const job = this.#jobs.get(name);
    return job ? { ...job } : undefined;
  }

  list(): JobStatus[] {
    return [...this.#jobs.values()].map((job) => ({ ...job }));
  }

  #update(name: string, patch: Partial<JobStatus>): void {
    const job = this.#jobs.get(name);
    if (job) {
      this.#jobs.set(name, { ...job, ...patch });
    }
  }
}
