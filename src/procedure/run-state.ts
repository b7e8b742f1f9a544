import type { TableSnapshot } from "../warehouse/ports.js";

// =============================================================================
// RESOLVED OBJECTS
// =============================================================================

export type ObjectKind = "table" | "view" | "procedure";

export const TABLE_ROLES = ["source", "target", "master"] as const;
// Views and procedures always carry "n/a".
export type ObjectRole = (typeof TABLE_ROLES)[number] | "n/a";

export type ResolvedObject = {
  qualifiedName: string;
  kind: ObjectKind;
  role: ObjectRole;
  definition: string;
};

// =============================================================================
// FIXTURES
// =============================================================================

export const NOT_APPLICABLE = "N/A";

export type Fixture = {
  name: string;
  description: string;
  insertQuery: string;
  sourceTable: string;
  expectedBehaviour: string;
  validationQuery: string;
  expectedCount: string;
  targetTable: string;
};

export type FixtureOutcome = "Pass" | "Fail" | "Error" | "Skipped";

export type FixtureResult = Readonly<{
  fixtureName: string;
  insertQuery: string;
  validationQuery: string;
  expectedCount: string;
  actualCount: number | null;
  outcome: FixtureOutcome;
  detail: string;
  sourceSnapshot: TableSnapshot;
  targetSnapshot: TableSnapshot;
}>;

// =============================================================================
// RUN STATE
// =============================================================================

export type RunState = {
  procedureName: string;
  procedureSchema: string;
  procedureDefinition: string;
  objects: ResolvedObject[];
  diagnostics: string[];
  fixtures: Fixture[];
  results: FixtureResult[];
  truncatedTables: Set<string>;
};

export function createRunState(args: {
  procedureName: string;
  procedureSchema: string;
  procedureDefinition: string;
}): RunState {
  return {
    ...args,
    objects: [],
    diagnostics: [],
    fixtures: [],
    results: [],
    truncatedTables: new Set<string>(),
  };
}

export function summarizeOutcomes(results: readonly FixtureResult[]): Record<FixtureOutcome, number> {
  const summary: Record<FixtureOutcome, number> = { Pass: 0, Fail: 0, Error: 0, Skipped: 0 };
  for (const result of results) {
    summary[result.outcome] += 1;
  }
  return summary;
}
