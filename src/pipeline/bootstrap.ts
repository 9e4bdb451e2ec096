/**
 * Process setup for a reconciliation job: run ID, validated configuration and
 * a logger at the configured level.
 */

import { loadAppConfig, validateConfig, type AppConfig } from "../config/index.js";
import { reconcileConfigFromEnv } from "../config/reconcile/loader.js";
import type { ReconcileConfig } from "../config/reconcile/schema.js";
import { createLogger, isLogLevel, type Logger, type LoggerOptions } from "../logging/logger.js";
import { initRunId } from "../logging/run-id.js";

export interface BootstrapOptions {
  /** Run ID of the job being resumed, if any */
  runId?: string;
  /** Logger overrides; the level always comes from configuration */
  logger?: Omit<LoggerOptions, "level">;
}

export interface ReconciliationRuntime {
  runId: string;
  app: AppConfig;
  reconcile: Readonly<ReconcileConfig>;
  logger: Logger;
}

/**
 * @throws ConfigError or ReconcileConfigError on invalid configuration
 */
export function bootstrapReconciliation(options: BootstrapOptions = {}): ReconciliationRuntime {
  const runId = initRunId(options.runId);
  const app = loadAppConfig();
  validateConfig(app);

  const level = isLogLevel(app.logLevel) ? app.logLevel : "info";
  const logger = createLogger({ ...options.logger, level: app.debug ? "debug" : level });
  const reconcile = reconcileConfigFromEnv();

  logger.info("Configuration loaded", {
    env: app.env,
    appName: app.appName,
    tolerance: reconcile.tolerance,
    groupFailurePolicy: reconcile.groupFailurePolicy,
  });

  return { runId, app, reconcile, logger };
}
