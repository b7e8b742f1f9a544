import { formatErrorMessage } from "../core/error-format.js";
import { renderPromptTemplate } from "../core/prompts.js";
import type { LlmClient } from "../llm/client.js";
import { normalizeCompletion } from "../llm/structured.js";

import { FixtureBatchJsonSchema, FixtureBatchSchema, toFixture } from "./fixture-schema.js";
import type { Fixture, ResolvedObject } from "./run-state.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProcedureIdentity = {
  name: string;
  schema: string;
};

export type SynthesizeFixturesResult = {
  fixtures: Fixture[];
  diagnostics: string[];
};

const EXPECTED_FIXTURE_COUNT = 2;

// =============================================================================
// SYNTHESIZER
// =============================================================================

export class FixtureSynthesizer {
  constructor(private readonly oracle: LlmClient) {}

  async synthesize(
    procedure: ProcedureIdentity,
    definition: string,
    objects: readonly ResolvedObject[],
  ): Promise<SynthesizeFixturesResult> {
    const diagnostics: string[] = [];

    let fixtures: Fixture[];
    try {
      const prompt = await renderPromptTemplate("fixture-synthesizer", {
        procedure_name: procedure.name,
        procedure_schema: procedure.schema,
        context: buildFixtureContext(procedure, definition, objects),
      });
      const completion = await this.oracle.complete(prompt, { schema: FixtureBatchJsonSchema });
      const batch = normalizeCompletion(completion, FixtureBatchSchema, "Fixture synthesizer");
      fixtures = batch.test_cases.map(toFixture);
    } catch (err) {
      diagnostics.push(`Fixture generation failed: ${formatErrorMessage(err)}`);
      return { fixtures: [], diagnostics };
    }

    if (fixtures.length !== EXPECTED_FIXTURE_COUNT) {
      diagnostics.push(
        `Expected ${EXPECTED_FIXTURE_COUNT} fixtures but the oracle returned ${fixtures.length}.`,
      );
    }

    return { fixtures, diagnostics };
  }
}

// =============================================================================
// CONTEXT
// =============================================================================

export function buildFixtureContext(
  procedure: ProcedureIdentity,
  definition: string,
  objects: readonly ResolvedObject[],
): string {
  const source: string[] = [];
  const target: string[] = [];
  const master: string[] = [];
  const other: string[] = [];

  for (const object of objects) {
    const entry = `${object.qualifiedName}:\n\`\`\`sql\n${object.definition}\n\`\`\`\n`;
    if (object.kind !== "table") {
      other.push(`-- ${object.kind.toUpperCase()}\n${entry}`);
      continue;
    }
    switch (object.role) {
      case "source":
        source.push(entry);
        break;
      case "target":
        target.push(entry);
        break;
      case "master":
        master.push(entry);
        break;
      case "n/a":
        other.push(`-- TABLE (Role: n/a)\n${entry}`);
        break;
    }
  }

  let context = `Procedure DDL (${procedure.schema}.${procedure.name}):\n\`\`\`sql\n${definition}\n\`\`\`\n\n`;
  if (objects.length === 0) {
    return `${context}No related object DDLs were found.\n`;
  }

  context += "Related Object DDLs by Role/Type:\n\n";
  const sections: Array<[string, string[]]> = [
    ["Source Tables", source],
    ["Target Tables", target],
    ["Master Tables", master],
    ["Other Objects (Views/Procedures/Misc Tables)", other],
  ];
  for (const [heading, entries] of sections) {
    if (entries.length > 0) {
      context += `**${heading}:**\n${entries.join("\n")}\n`;
    }
  }
  return context;
}
