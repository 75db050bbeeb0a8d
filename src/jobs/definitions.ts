import type { AppContainer } from "../container";
import type { ScheduledJobDefinition } from "./scheduler";

export function buildScheduledJobs(container: AppContainer): ScheduledJobDefinition[] {
  const { config, logger, caches } = container;

  const jobs: ScheduledJobDefinition[] = [
    {
      name: "memory.cleanup_orphans",
      schedule: config.jobs.cleanupCron,
      description: "Deletes entities and edges no memory points at any more.",
      task: async () => {
        const stats = await container.services.memory.cleanupOrphans(false);
        logger.info({ ...stats }, "Orphan cleanup completed");
      },
    },
    {
      name: "cache.prune",
      schedule: config.jobs.cachePruneCron,
      description: "Drops expired entries from the id, embedding and search caches.",
      task: () => {
        const pruned = {
          idResolver: caches.resolver.prune(),
          embedding: caches.embeddings.prune(),
          search: caches.search.pruneCache(),
        };
        logger.info(pruned, "Cache prune completed");
      },
    },
  ];

  if (config.jobs.remarkUserIds.length > 0) {
    jobs.push({
      name: "memory.remark",
      schedule: config.jobs.remarkCron,
      description: "Re-extracts entities and concepts for memories stored without them.",
      task: async () => {
        for (const userId of config.jobs.remarkUserIds) {
          await container.remark.remarkAll(userId, { batchSize: config.jobs.remarkBatchSize });
        }
      },
    });
  }

  return jobs;
}
