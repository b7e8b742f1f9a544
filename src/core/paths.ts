import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  sqlprobeHome: string;
};

export type ResolveHomeOptions = {
  sqlprobeHome?: string;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveSqlprobeHome(opts: ResolveHomeOptions = {}): string {
  if (opts.sqlprobeHome) {
    return path.resolve(opts.sqlprobeHome);
  }

  if (process.env.SQLPROBE_HOME) {
    return path.resolve(process.env.SQLPROBE_HOME);
  }

  return path.join(os.homedir(), ".sqlprobe");
}

export function createPathsContext(opts: ResolveHomeOptions = {}): PathsContext {
  return { sqlprobeHome: resolveSqlprobeHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function homeConfigPath(paths?: PathsContext): string {
  return path.join(resolveSqlprobeHome(paths), "config.yaml");
}

export function defaultReportsDir(paths?: PathsContext): string {
  return path.join(resolveSqlprobeHome(paths), "reports");
}

export function runLogsDir(runId: string, paths?: PathsContext): string {
  return path.join(resolveSqlprobeHome(paths), "logs", `run-${runId}`);
}

export function runLogPath(runId: string, paths?: PathsContext): string {
  return path.join(runLogsDir(runId, paths), "run.jsonl");
}
