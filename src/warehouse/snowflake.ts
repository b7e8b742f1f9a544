import snowflake from "snowflake-sdk";

import type { WarehouseConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { ExecutionError } from "../core/errors.js";
import { logRunEvent, type RunLogger } from "../core/logger.js";
import { truncate } from "../llm/structured.js";

import {
  COUNT_NO_DATA,
  COUNT_QUERY_FAILED,
  type DefinitionResult,
  type TableSnapshot,
  type Warehouse,
} from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type SnowflakeRow = Record<string, unknown>;

export type StatementTransport = {
  execute(sqlText: string, binds?: Array<string | number>): Promise<SnowflakeRow[]>;
  close(): Promise<void>;
};

export type SnowflakeWarehouseOptions = {
  logger?: RunLogger;
};

const NOT_FOUND_PATTERN = /does not exist|not authorized/i;

// =============================================================================
// ADAPTER
// =============================================================================

export class SnowflakeWarehouse implements Warehouse {
  private readonly logger?: RunLogger;

  constructor(
    private readonly transport: StatementTransport,
    options: SnowflakeWarehouseOptions = {},
  ) {
    this.logger = options.logger;
  }

  static async connect(
    cfg: WarehouseConfig,
    options: SnowflakeWarehouseOptions = {},
  ): Promise<SnowflakeWarehouse> {
    return new SnowflakeWarehouse(await connectSnowflake(cfg), options);
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  // ---------------------------------------------------------------------------
  // Definition lookup
  // ---------------------------------------------------------------------------

  async getProcedureDefinition(name: string, schema: string): Promise<DefinitionResult> {
    const label = `Procedure ${schema.toUpperCase()}.${name.toUpperCase()}`;
    return this.lookup(
      label,
      "SELECT procedure_definition FROM information_schema.procedures " +
        "WHERE procedure_name = ? AND procedure_schema = ?",
      [name.toUpperCase(), schema.toUpperCase()],
    );
  }

  async getTableDefinition(qualifiedName: string): Promise<DefinitionResult> {
    const unquoted = qualifiedName.replace(/"/g, "");
    return this.lookup(`Table ${unquoted}`, "SELECT GET_DDL('TABLE', ?)", [unquoted]);
  }

  async getPipeDefinition(name: string, schema: string): Promise<DefinitionResult> {
    const qualified = `${schema}.${name}`;
    return this.lookup(`Pipe ${qualified}`, "SELECT GET_DDL('PIPE', ?)", [qualified]);
  }

  // ---------------------------------------------------------------------------
  // Query execution
  // ---------------------------------------------------------------------------

  async runCount(query: string): Promise<number> {
    let rows: SnowflakeRow[];
    try {
      rows = await this.transport.execute(query);
    } catch (err) {
      this.logQueryError(query, err);
      return COUNT_QUERY_FAILED;
    }

    const value = firstValue(rows);
    if (value === undefined || value === null) {
      return COUNT_NO_DATA;
    }

    const count = Number(value);
    if (!Number.isInteger(count)) {
      this.logQueryError(query, new Error(`Count query returned a non-integer value: ${String(value)}`));
      return COUNT_QUERY_FAILED;
    }
    return count;
  }

  async runStatement(query: string): Promise<boolean> {
    try {
      await this.transport.execute(query);
      return true;
    } catch (err) {
      this.logQueryError(query, err);
      return false;
    }
  }

  async runToTable(query: string): Promise<TableSnapshot | null> {
    try {
      const rows = await this.transport.execute(query);
      const columns = rows.length > 0 ? Object.keys(rows[0]) : [];
      return { columns, rows };
    } catch (err) {
      this.logQueryError(query, err);
      return null;
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async lookup(
    label: string,
    sqlText: string,
    binds: string[],
  ): Promise<DefinitionResult> {
    try {
      const rows = await this.transport.execute(sqlText, binds);
      const value = firstValue(rows);
      if (typeof value === "string" && value.trim().length > 0) {
        return { status: "found", text: value };
      }
      return { status: "not_found", message: `${label} not found.` };
    } catch (err) {
      const detail = formatErrorMessage(err);
      if (NOT_FOUND_PATTERN.test(detail)) {
        return { status: "not_found", message: `${label} not found: ${detail}` };
      }
      return { status: "error", message: `Error fetching definition for ${label}: ${detail}` };
    }
  }

  private logQueryError(query: string, error: unknown): void {
    if (!this.logger) return;
    logRunEvent(this.logger, "warehouse.query_error", {
      query: truncate(query, 500),
      message: formatErrorMessage(error),
    });
  }
}

// =============================================================================
// DRIVER
// =============================================================================

export async function connectSnowflake(cfg: WarehouseConfig): Promise<StatementTransport> {
  const connection = snowflake.createConnection({
    account: cfg.account,
    username: cfg.username,
    password: cfg.password,
    warehouse: cfg.warehouse,
    database: cfg.database,
    schema: cfg.schema,
    role: cfg.role,
  });

  try {
    await new Promise<void>((resolve, reject) => {
      connection.connect((err) => (err ? reject(err) : resolve()));
    });
  } catch (err) {
    throw new ExecutionError(
      `Failed to connect to Snowflake account ${cfg.account}: ${formatErrorMessage(err)}`,
      err,
    );
  }

  return {
    execute: (sqlText, binds) =>
      new Promise((resolve, reject) => {
        connection.execute({
          sqlText,
          binds,
          complete: (err, _statement, rows) => {
            if (err) {
              reject(err);
              return;
            }
            resolve(rows ?? []);
          },
        });
      }),
    close: () =>
      new Promise((resolve, reject) => {
        connection.destroy((err) => (err ? reject(err) : resolve()));
      }),
  };
}

function firstValue(rows: SnowflakeRow[]): unknown {
  const row = rows[0];
  if (!row) return undefined;
  return Object.values(row)[0];
}
