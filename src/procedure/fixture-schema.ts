import { z } from "zod";

import type { Fixture } from "./run-state.js";

// =============================================================================
// SCHEMA
// =============================================================================

const FixtureEntrySchema = z
  .object({
    test_case: z.string(),
    brief_description: z.string(),
    insert_query: z.string(),
    source_table: z.string(),
    expected_behaviour: z.string(),
    validation_query: z.string(),
    expected_count: z.union([z.string(), z.number()]).transform((value) => String(value)),
    target_table: z.string(),
  })
  .strict();

export const FixtureBatchSchema = z
  .object({
    test_cases: z.array(FixtureEntrySchema),
  })
  .strict();

export type FixtureEntry = z.infer<typeof FixtureEntrySchema>;

// Sent to the oracle as the structured-output schema. Strict providers need every
// property listed as required and no extras.
const FIXTURE_PROPERTIES = [
  "test_case",
  "brief_description",
  "insert_query",
  "source_table",
  "expected_behaviour",
  "validation_query",
  "expected_count",
  "target_table",
] as const;

export const FixtureBatchJsonSchema: Record<string, unknown> = {
  type: "object",
  properties: {
    test_cases: {
      type: "array",
      items: {
        type: "object",
        properties: Object.fromEntries(
          FIXTURE_PROPERTIES.map((key) => [key, { type: "string" }]),
        ),
        required: [...FIXTURE_PROPERTIES],
        additionalProperties: false,
      },
    },
  },
  required: ["test_cases"],
  additionalProperties: false,
};

// =============================================================================
// MAPPING
// =============================================================================

export function toFixture(entry: FixtureEntry): Fixture {
  return {
    name: entry.test_case,
    description: entry.brief_description,
    insertQuery: entry.insert_query,
    sourceTable: entry.source_table,
    expectedBehaviour: entry.expected_behaviour,
    validationQuery: entry.validation_query,
    expectedCount: entry.expected_count,
    targetTable: entry.target_table,
  };
}
