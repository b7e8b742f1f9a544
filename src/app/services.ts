/**
 * Live collaborators for one CLI run.
 * Purpose: build the oracle, warehouse, uploader and run log from config in one place.
 * Assumptions: nothing that can fail on bad config runs after a connection is open.
 * Usage: const services = await openPipeServices(ctx, { runId, target }); ... await services.close();
 */

import { ConfigError } from "../core/errors.js";
import { JsonlLogger } from "../core/logger.js";
import { runLogPath } from "../core/paths.js";
import { delay } from "../core/utils.js";
import type { LlmClient } from "../llm/client.js";
import { createLlmClient } from "../llm/factory.js";
import { AzureBlobUploader } from "../storage/azure-blob.js";
import type { BlobUploader } from "../storage/ports.js";
import { SnowflakeWarehouse } from "../warehouse/snowflake.js";

import type { AppContext } from "./context.js";

export type RunServices = {
  runId: string;
  oracle: LlmClient;
  warehouse: SnowflakeWarehouse;
  logger: JsonlLogger;
  sleep: (ms: number) => Promise<void>;
  settleMs: number;
  reportsDir: string;
  close(): Promise<void>;
};

export type PipeServices = RunServices & { uploader: BlobUploader };

export type OpenRunServicesOptions = {
  runId: string;
  target: string;
};

export async function openRunServices(
  ctx: AppContext,
  opts: OpenRunServicesOptions,
): Promise<RunServices> {
  return openServices(ctx, opts, () => ({}));
}

export async function openPipeServices(
  ctx: AppContext,
  opts: OpenRunServicesOptions,
): Promise<PipeServices> {
  const storage = ctx.config.storage;
  if (!storage) {
    throw new ConfigError(`Pipe tests need a storage section in ${ctx.configPath}.`);
  }

  return openServices(ctx, opts, (logger) => ({
    uploader: AzureBlobUploader.fromConfig(storage, logger),
  }));
}

// =============================================================================
// INTERNALS
// =============================================================================

async function openServices<TExtra extends object>(
  ctx: AppContext,
  opts: OpenRunServicesOptions,
  buildExtra: (logger: JsonlLogger) => TExtra,
): Promise<RunServices & TExtra> {
  const { config } = ctx;
  const oracle = createLlmClient(config.llm);

  const logger = new JsonlLogger(runLogPath(opts.runId, ctx.paths), {
    runId: opts.runId,
    target: opts.target,
  });

  let extra: TExtra;
  let warehouse: SnowflakeWarehouse;
  try {
    extra = buildExtra(logger);
    warehouse = await SnowflakeWarehouse.connect(config.warehouse, { logger });
  } catch (err) {
    logger.close();
    throw err;
  }

  return {
    ...extra,
    runId: opts.runId,
    oracle,
    warehouse,
    logger,
    sleep: delay,
    settleMs: config.pipe.settle_seconds * 1000,
    reportsDir: config.reports_dir,
    close: async () => {
      try {
        await warehouse.close();
      } finally {
        logger.close();
      }
    },
  };
}
