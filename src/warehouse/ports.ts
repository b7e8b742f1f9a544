/**
 * Warehouse ports define the boundary between the test pipelines and the live warehouse.
 * Purpose: keep stages free of driver details so they run against in-memory fakes in tests.
 * Assumptions: every call resolves; failures come back as values, never as rejections.
 * Usage: implemented by `SnowflakeWarehouse`; faked by `FakeWarehouse` in src/__tests__.
 */

// =============================================================================
// DEFINITION LOOKUP
// =============================================================================

export type DefinitionResult =
  | { status: "found"; text: string }
  | { status: "not_found"; message: string }
  | { status: "error"; message: string };

export interface DefinitionLookup {
  getProcedureDefinition(name: string, schema: string): Promise<DefinitionResult>;
  getTableDefinition(qualifiedName: string): Promise<DefinitionResult>;
  getPipeDefinition(name: string, schema: string): Promise<DefinitionResult>;
}

// =============================================================================
// QUERY EXECUTION
// =============================================================================

/** `runCount` result when the query returned no rows or a null first value. */
export const COUNT_NO_DATA = -1;
/** `runCount` result when the query failed or did not yield an integer. */
export const COUNT_QUERY_FAILED = -2;

export type TableSnapshot = {
  columns: string[];
  rows: Record<string, unknown>[];
};

export interface QueryExecutor {
  /** First column of the first row as an integer, or one of the negative sentinels. */
  runCount(query: string): Promise<number>;
  runStatement(query: string): Promise<boolean>;
  runToTable(query: string): Promise<TableSnapshot | null>;
}

export type Warehouse = DefinitionLookup & QueryExecutor;

export function emptySnapshot(): TableSnapshot {
  return { columns: [], rows: [] };
}
