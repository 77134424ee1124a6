import { Queue, Worker, type Job } from "bullmq";

import { logger } from "../infrastructure/logger.js";
import { createRedisConnection } from "../infrastructure/redis.js";
import type { CalculateTaxBatchJob, CalculateTaxBatchResult } from "./handlers.js";

export const queueNames = {
  calculateTaxBatch: "calculate_tax_batch"
} as const;

export interface BatchSnapshot {
  batchId: string;
  state: string;
  result: CalculateTaxBatchResult | null;
  failedReason: string | null;
}

/** What the HTTP layer needs from the batch queue. */
export interface BatchQueue {
  enqueue(job: CalculateTaxBatchJob): Promise<void>;
  get(batchId: string): Promise<BatchSnapshot | null>;
  close(): Promise<void>;
}

export function createQueue<TData, TResult>(name: string) {
  return new Queue<TData, TResult>(name, {
    connection: createRedisConnection(),
    defaultJobOptions: {
      removeOnComplete: 100,
      removeOnFail: 500
    }
  });
}

export function createWorker<TData, TResult>(name: string, processor: (job: Job<TData, TResult>) => Promise<TResult>) {
  const worker = new Worker<TData, TResult>(name, processor, {
    connection: createRedisConnection()
  });

  worker.on("completed", (job) => {
    logger.info({ jobId: job.id, queue: name }, "worker job completed");
  });

  worker.on("failed", (job, error) => {
    logger.error({ jobId: job?.id, queue: name, error }, "worker job failed");
  });

  return worker;
}

export function createBatchQueue(): BatchQueue {
  const queue = createQueue<CalculateTaxBatchJob, CalculateTaxBatchResult>(queueNames.calculateTaxBatch);

  return {
    async enqueue(job) {
      await queue.add(queueNames.calculateTaxBatch, job, { jobId: job.batchId });
    },
    async get(batchId) {
      const job = await queue.getJob(batchId);
      if (!job) {
        return null;
      }

      const state = await job.getState();

      return {
        batchId,
        state,
        result: state === "completed" ? job.returnvalue : null,
        failedReason: state === "failed" ? job.failedReason : null
      };
    },
    async close() {
      await queue.close();
    }
  };
}
