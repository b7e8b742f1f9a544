import { Command } from "commander";

import type { AppContext } from "../app/context.js";
import { defaultRunId } from "../core/utils.js";

import { loadConfigForCli } from "./config.js";
import { initCommand } from "./init.js";
import { pipeCommand } from "./pipe.js";
import { procedureCommand } from "./procedure.js";

type GlobalOptions = {
  config?: string;
  runId?: string;
  debug?: boolean;
};

type ObjectOptions = {
  schema: string;
  name: string;
};

export function buildCli(): Command {
  const program = new Command();

  const resolveContext = (): { appContext: AppContext; runId: string } => {
    const globals = program.opts<GlobalOptions>();
    const { appContext } = loadConfigForCli({ explicitConfigPath: globals.config });
    return { appContext, runId: globals.runId ?? defaultRunId() };
  };

  program
    .name("sqlprobe")
    .description("Generate and run regression tests for warehouse procedures and ingestion pipes")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Config path (defaults to SQLPROBE_CONFIG, ./sqlprobe.yaml or ~/.sqlprobe/config.yaml)",
    )
    .option("--run-id <id>", "Run id for logs and reports (default: timestamp)")
    .option("--debug", "Print error codes, causes and stack traces", false);

  program
    .command("init")
    .description("Write a starter config")
    .option("--force", "Overwrite an existing config", false)
    .action((opts: { force: boolean }) => {
      const globals = program.opts<GlobalOptions>();
      initCommand({ configPath: globals.config, force: opts.force });
    });

  program
    .command("procedure")
    .description("Resolve, synthesize and run fixtures for a stored procedure")
    .requiredOption("--schema <schema>", "Procedure schema")
    .requiredOption("--name <name>", "Procedure name")
    .action(async (opts: ObjectOptions) => {
      const { appContext, runId } = resolveContext();
      await procedureCommand(appContext, { schema: opts.schema, name: opts.name, runId });
    });

  program
    .command("pipe")
    .description("Generate a feed for an ingestion pipe, upload it and verify the load")
    .requiredOption("--schema <schema>", "Pipe schema")
    .requiredOption("--name <name>", "Pipe name")
    .action(async (opts: ObjectOptions) => {
      const { appContext, runId } = resolveContext();
      await pipeCommand(appContext, { schema: opts.schema, name: opts.name, runId });
    });

  return program;
}
