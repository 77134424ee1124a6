import { loadTaxDatabase } from "../domain/rulesets/loader.js";
import { logger } from "../infrastructure/logger.js";
import { handleCalculateTaxBatch, type CalculateTaxBatchJob, type CalculateTaxBatchResult } from "./handlers.js";
import { createWorker, queueNames } from "./queues.js";

const database = loadTaxDatabase();

createWorker<CalculateTaxBatchJob, CalculateTaxBatchResult>(queueNames.calculateTaxBatch, async (job) =>
  handleCalculateTaxBatch(job.data, database)
);

logger.info("worker runtime started");
