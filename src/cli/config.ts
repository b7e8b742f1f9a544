import { createAppContext, type AppContext } from "../app/context.js";
import { resolveConfigPath, type ConfigSource } from "../core/config-discovery.js";
import { loadProjectConfig } from "../core/config-loader.js";
import { createPathsContext } from "../core/paths.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
//
// Order: --config, SQLPROBE_CONFIG, ./sqlprobe.yaml, <SQLPROBE_HOME>/config.yaml.
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

export function loadConfigForCli(args: LoadConfigForCliArgs): {
  appContext: AppContext;
  source: ConfigSource;
} {
  const paths = createPathsContext();
  const resolved = resolveConfigPath({ explicitPath: args.explicitConfigPath, cwd: args.cwd }, paths);
  const config = loadProjectConfig(resolved.configPath, paths);

  return {
    appContext: createAppContext({
      configPath: resolved.configPath,
      config,
      sqlprobeHome: paths.sqlprobeHome,
    }),
    source: resolved.source,
  };
}
