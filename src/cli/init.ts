import { initConfig, type InitResult } from "../core/config-discovery.js";

// =============================================================================
// INIT (starter config)
// =============================================================================

export function initCommand(opts: { configPath?: string; force?: boolean }): InitResult {
  const result = initConfig({ configPath: opts.configPath, force: opts.force ?? false });

  if (result.status === "created") {
    console.log(`Created sqlprobe config at ${result.configPath}`);
  } else if (result.status === "overwritten") {
    console.log(`Overwrote sqlprobe config at ${result.configPath}`);
  } else {
    console.log(`sqlprobe config already exists at ${result.configPath}`);
  }

  return result;
}
