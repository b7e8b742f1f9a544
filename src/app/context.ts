/**
 * AppContext bundles the resolved config with the paths derived from it.
 * Purpose: make the config path and SQLPROBE_HOME explicit for CLI commands and services.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createAppContext({ configPath, config }).
 */

import path from "node:path";

import type { ResolvedProjectConfig } from "../core/config.js";
import { createPathsContext, type PathsContext } from "../core/paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  configPath: string;
  config: ResolvedProjectConfig;
  sqlprobeHome: string;
  paths: PathsContext;
};

export type CreateAppContextInput = {
  configPath: string;
  config: ResolvedProjectConfig;
  sqlprobeHome?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  const paths = createPathsContext({ sqlprobeHome: input.sqlprobeHome });

  return {
    configPath: path.resolve(input.configPath),
    config: input.config,
    sqlprobeHome: paths.sqlprobeHome,
    paths,
  };
}
