import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach } from "vitest";

// =============================================================================
// ENVIRONMENT ISOLATION
// =============================================================================

const ISOLATED_ENV_KEYS = [
  "SQLPROBE_HOME",
  "SQLPROBE_CONFIG",
  "MOCK_LLM",
  "MOCK_LLM_OUTPUT",
  "MOCK_LLM_OUTPUT_PATH",
] as const;

let savedEnv: Record<string, string | undefined> = {};
let tempHome: string | null = null;

beforeEach(() => {
  savedEnv = Object.fromEntries(ISOLATED_ENV_KEYS.map((key) => [key, process.env[key]]));
  for (const key of ISOLATED_ENV_KEYS) {
    delete process.env[key];
  }

  tempHome = fs.mkdtempSync(path.join(os.tmpdir(), "sqlprobe-home-"));
  process.env.SQLPROBE_HOME = tempHome;
});

afterEach(() => {
  for (const key of ISOLATED_ENV_KEYS) {
    const value = savedEnv[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  if (tempHome) {
    fs.rmSync(tempHome, { recursive: true, force: true });
    tempHome = null;
  }
});
