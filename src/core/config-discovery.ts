import fs from "node:fs";
import path from "node:path";

import { homeConfigPath, type PathsContext } from "./paths.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const LOCAL_CONFIG_FILE = "sqlprobe.yaml";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "env" | "local" | "home";

export type ConfigResolution = {
  configPath: string;
  source: ConfigSource;
};

export type InitResult = {
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveConfigPath(
  args: {
    explicitPath?: string;
    cwd?: string;
  } = {},
  paths?: PathsContext,
): ConfigResolution {
  if (args.explicitPath) {
    return { configPath: path.resolve(args.explicitPath), source: "explicit" };
  }

  const fromEnv = process.env.SQLPROBE_CONFIG;
  if (fromEnv && fromEnv.trim().length > 0) {
    return { configPath: path.resolve(fromEnv), source: "env" };
  }

  const localConfig = path.join(args.cwd ?? process.cwd(), LOCAL_CONFIG_FILE);
  if (fs.existsSync(localConfig)) {
    return { configPath: localConfig, source: "local" };
  }

  return { configPath: homeConfigPath(paths), source: "home" };
}

export function initConfig(
  args: { configPath?: string; force?: boolean } = {},
  paths?: PathsContext,
): InitResult {
  const configPath = path.resolve(args.configPath ?? homeConfigPath(paths));
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  if (hasConfig && !force) {
    return { configPath, status: "exists" };
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, defaultConfigYaml(), "utf8");

  return { configPath, status: hasConfig ? "overwritten" : "created" };
}

// =============================================================================
// INTERNALS
// =============================================================================

function defaultConfigYaml(): string {
  return [
    "# sqlprobe configuration",
    "#",
    "# Values like ${SNOWFLAKE_PASSWORD} are read from the environment at load time.",
    "",
    "llm:",
    "  # openai | anthropic | mock",
    "  provider: openai",
    "  model: gpt-4o-mini",
    "  temperature: 0",
    "  timeout_seconds: 120",
    "",
    "warehouse:",
    "  account: ${SNOWFLAKE_ACCOUNT}",
    "  username: ${SNOWFLAKE_USER}",
    "  password: ${SNOWFLAKE_PASSWORD}",
    "  warehouse: COMPUTE_WH",
    "  database: ANALYTICS",
    "  # role: TESTER",
    "",
    "# Only needed for pipe tests.",
    "# storage:",
    "#   connection_string: ${AZURE_STORAGE_CONNECTION_STRING}",
    "#   container: landing",
    "",
    "pipe:",
    "  settle_seconds: 35",
    "",
    "# Defaults to <SQLPROBE_HOME>/reports",
    "# reports_dir: ./reports",
    "",
  ].join("\n");
}
