import cron, { type ScheduledTask } from "node-cron";
import type { AppLogger } from "../logging";
import { errorMessage } from "../services/errors";
import { type Clock, systemClock } from "../services/types";
import { JobStatusStore } from "./status-store";

export interface ScheduledJobDefinition {
  name: string;
  schedule: string;
  description?: string;
  task: () => Promise<void> | void;
}

interface RegisteredJob {
  definition: ScheduledJobDefinition;
  task: ScheduledTask;
}

export class JobScheduler {
  #logger: AppLogger;
  #statuses: JobStatusStore;
  #now: Clock;
  #jobs = new Map<string, RegisteredJob>();

  constructor(logger: AppLogger, statuses = new JobStatusStore(), now: Clock = systemClock) {
    this.#logger = logger.child({ component: "scheduler" });
    this.#statuses = statuses;
    this.#now = now;
  }

  get statuses(): JobStatusStore {
    return this.#statuses;
  }

  register(definition: ScheduledJobDefinition): void {
    if (this.#jobs.has(definition.name)) {
      throw new Error(`Job "${definition.name}" already registered`);
    }
    if (!cron.validate(definition.schedule)) {
      throw new Error(`Job "${definition.name}" has an invalid schedule: ${definition.schedule}`);
    }

    const task = cron.schedule(definition.schedule, () => void this.#execute(definition), {
      scheduled: false,
    });

    this.#jobs.set(definition.name, { definition, task });
    this.#statuses.register(definition.name, definition.schedule);

    this.#logger.debug(
      { job: definition.name, schedule: definition.schedule },
      "Registered scheduled job",
    );
  }

  startAll(): void {
    for (const { definition, task } of this.#jobs.values()) {
      task.start();
      this.#logger.info(
        { job: definition.name, schedule: definition.schedule },
        "Started scheduled job",
      );
    }
  }

  stopAll(): void {
    for (const { definition, task } of this.#jobs.values()) {
      task.stop();
      this.#logger.info({ job: definition.name }, "Stopped scheduled job");
    }
  }

  async runJobNow(name: string): Promise<void> {
    const registered = this.#jobs.get(name);
    if (!registered) {
      throw new Error(`Job "${name}" is not registered`);
    }
    await this.#execute(registered.definition);
  }

  listJobs(): Array<{ name: string; schedule: string; description?: string }> {
    return Array.from(this.#jobs.values()).map(({ definition }) => ({
      name: definition.name,
      schedule: definition.schedule,
      description: definition.description,
    }));
  }

  async #execute(definition: ScheduledJobDefinition): Promise<void> {
    const start = Date.now();
    this.#statuses.markRunning(definition.name, this.#now());
    this.#logger.info({ job: definition.name }, "Job started");

    try {
      await definition.task();
      const durationMs = Date.now() - start;
      this.#statuses.markRun(definition.name, "succeeded", { durationMs });
      this.#logger.info({ job: definition.name, durationMs }, "Job completed");
    } catch (error) {
      const durationMs = Date.now() - start;
      this.#statuses.markRun(definition.name, "failed", {
        durationMs,
        error: errorMessage(error),
      });
      this.#logger.error({ job: definition.name, durationMs, err: error }, "Job failed");
    }
  }
}
