/**
 * Fixture execution and verification.
 * Purpose: run each synthesized fixture against the warehouse and classify the outcome.
 * Assumptions: fixtures run one after another; a failure inside one fixture never aborts the batch.
 * Usage: `new ExecutionEngine(executor).execute(fixtures, procedure, runState)`.
 */

import { formatErrorMessage } from "../core/error-format.js";
import { InvalidExpectedCountError } from "../core/errors.js";
import { emptySnapshot, type QueryExecutor, type TableSnapshot } from "../warehouse/ports.js";

import type { ProcedureIdentity } from "./fixture-synthesizer.js";
import {
  NOT_APPLICABLE,
  type Fixture,
  type FixtureOutcome,
  type FixtureResult,
} from "./run-state.js";

// =============================================================================
// TYPES
// =============================================================================

/** The slice of run state the engine reads and appends to. */
export type ExecutionContext = {
  truncatedTables: Set<string>;
  diagnostics: string[];
};

type ResultDraft = {
  actualCount: number | null;
  outcome: FixtureOutcome;
  detail: string;
  warnings: string[];
  sourceSnapshot: TableSnapshot;
  targetSnapshot: TableSnapshot;
};

// =============================================================================
// ENGINE
// =============================================================================

export class ExecutionEngine {
  constructor(private readonly executor: QueryExecutor) {}

  async execute(
    fixtures: readonly Fixture[],
    procedure: ProcedureIdentity,
    context: ExecutionContext,
  ): Promise<FixtureResult[]> {
    if (fixtures.length === 0) {
      context.diagnostics.push("No fixtures available to execute.");
      return [];
    }

    await this.truncateTablesOnce(fixtures, context);

    const results: FixtureResult[] = [];
    for (const fixture of fixtures) {
      const result = await this.runFixture(fixture, procedure, context);
      context.diagnostics.push(`Fixture "${fixture.name}": ${result.outcome}`);
      results.push(result);
    }
    return results;
  }

  /** Truncates each source and target table of the executable fixtures unless this run already did. */
  async truncateTablesOnce(
    fixtures: readonly Fixture[],
    context: ExecutionContext,
  ): Promise<void> {
    const tables = new Set<string>();
    for (const fixture of fixtures.filter(isExecutable)) {
      tables.add(fixture.sourceTable);
      tables.add(fixture.targetTable);
    }

    for (const table of tables) {
      if (context.truncatedTables.has(table)) continue;

      const ok = await this.executor.runStatement(`TRUNCATE TABLE IF EXISTS ${table};`);
      if (ok) {
        context.truncatedTables.add(table);
        context.diagnostics.push(`Truncated ${table} before fixture execution.`);
      } else {
        context.diagnostics.push(
          `Critical Error: Failed to truncate table ${table} before fixture execution. ` +
            "Fixtures using this table may be unreliable.",
        );
      }
    }
  }

  private async runFixture(
    fixture: Fixture,
    procedure: ProcedureIdentity,
    context: ExecutionContext,
  ): Promise<FixtureResult> {
    const draft: ResultDraft = {
      actualCount: null,
      outcome: "Skipped",
      detail: "Missing required fields for execution.",
      warnings: [],
      sourceSnapshot: emptySnapshot(),
      targetSnapshot: emptySnapshot(),
    };

    if (!isExecutable(fixture)) {
      context.diagnostics.push(
        `Skipping fixture "${fixture.name}": missing or N/A execution fields.`,
      );
      return freezeResult(fixture, draft);
    }

    if (!context.truncatedTables.has(fixture.targetTable)) {
      context.diagnostics.push(
        `Warning: fixture "${fixture.name}" targets ${fixture.targetTable}, which was not truncated. ` +
          "Results may be inaccurate.",
      );
    }

    try {
      await this.verifyFixture(fixture, procedure, draft);
    } catch (err) {
      draft.outcome = "Error";
      draft.detail =
        err instanceof InvalidExpectedCountError
          ? "Invalid format for expected_count."
          : `Unexpected execution error: ${formatErrorMessage(err)}`;
    }

    return freezeResult(fixture, draft);
  }

  private async verifyFixture(
    fixture: Fixture,
    procedure: ProcedureIdentity,
    draft: ResultDraft,
  ): Promise<void> {
    const expected = parseExpectedCount(fixture.expectedCount);
    draft.outcome = "Error";

    if (!(await this.executor.runStatement(fixture.insertQuery))) {
      draft.detail = `Failed to execute insert query: ${fixture.insertQuery}`;
      return;
    }

    const source = await this.executor.runToTable(`SELECT * FROM ${fixture.sourceTable};`);
    if (source) {
      draft.sourceSnapshot = source;
    } else {
      draft.warnings.push("Warning: Failed to capture source data after insert.");
    }

    const call = `CALL ${procedure.schema}.${procedure.name}();`;
    if (!(await this.executor.runStatement(call))) {
      draft.detail = `Failed to execute procedure call: ${call}`;
      return;
    }

    const target = await this.executor.runToTable(`SELECT * FROM ${fixture.targetTable};`);
    if (target) {
      draft.targetSnapshot = target;
    } else {
      draft.warnings.push("Warning: Failed to capture target data after procedure call.");
    }

    const actual = await this.executor.runCount(fixture.validationQuery);
    draft.actualCount = actual;
    if (actual < 0) {
      draft.detail = `Failed to execute validation query: ${fixture.validationQuery}`;
      return;
    }

    if (actual === expected) {
      draft.outcome = "Pass";
      draft.detail = "Test passed.";
    } else {
      draft.outcome = "Fail";
      draft.detail = `Expected count ${expected}, but got ${actual}.`;
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function isExecutable(fixture: Fixture): boolean {
  return [
    fixture.insertQuery,
    fixture.sourceTable,
    fixture.validationQuery,
    fixture.expectedCount,
    fixture.targetTable,
  ].every((value) => {
    const trimmed = value.trim();
    return trimmed.length > 0 && trimmed !== NOT_APPLICABLE;
  });
}

export function parseExpectedCount(raw: string): number {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new InvalidExpectedCountError(raw);
  }
  return Number.parseInt(trimmed, 10);
}

function freezeResult(fixture: Fixture, draft: ResultDraft): FixtureResult {
  const detail = [draft.detail, ...draft.warnings].join(" ");
  return Object.freeze({
    fixtureName: fixture.name,
    insertQuery: fixture.insertQuery,
    validationQuery: fixture.validationQuery,
    expectedCount: fixture.expectedCount,
    actualCount: draft.actualCount,
    outcome: draft.outcome,
    detail,
    sourceSnapshot: draft.sourceSnapshot,
    targetSnapshot: draft.targetSnapshot,
  });
}
