import { describe, expect, it } from "vitest";

import { FakeWarehouse } from "../__tests__/fakes.js";

import { PipeResolver, extractPipeDetails } from "./pipe-resolver.js";
import { createPipeRunState } from "./pipe-state.js";

const PIPE_DDL = [
  "create or replace pipe RAW.ORDERS_PIPE auto_ingest=true as",
  'COPY INTO DB.RAW."ORDERS"',
  "FROM (SELECT t.$1, t.$2, METADATA$FILENAME FROM @DB.RAW.LANDING/orders/daily/ t)",
  "PATTERN = '.*[.]csv'",
  "FILE_FORMAT = (TYPE = CSV SKIP_HEADER = 1);",
].join("\n");

function initial() {
  return createPipeRunState({ pipeName: "ORDERS_PIPE", pipeSchema: "RAW" });
}

describe("extractPipeDetails", () => {
  it("pulls the target table, stage path and file pattern", () => {
    expect(extractPipeDetails(PIPE_DDL)).toEqual({
      targetTable: "DB.RAW.ORDERS",
      stageName: "DB.RAW.LANDING",
      folderPath: "orders/daily",
      filePattern: ".*[.]csv",
    });
  });

  it("allows an empty stage path and the arrow pattern form", () => {
    const details = extractPipeDetails("copy into T from @STG pattern => 'x.csv'");
    expect(details.folderPath).toBe("");
    expect(details.filePattern).toBe("x.csv");
  });

  it("returns nulls when nothing matches", () => {
    expect(extractPipeDetails("select 1")).toEqual({
      targetTable: null,
      stageName: null,
      folderPath: null,
      filePattern: null,
    });
  });
});

describe("PipeResolver", () => {
  it("fills in the pipe details and the target table definition", async () => {
    const warehouse = new FakeWarehouse()
      .setPipe("RAW", "ORDERS_PIPE", PIPE_DDL)
      .setTable("DB.RAW.ORDERS", "create table ORDERS (ID NUMBER, NAME VARCHAR)");

    const state = await new PipeResolver(warehouse).resolve(initial());

    expect(state).toMatchObject({
      pipeDefinition: PIPE_DDL,
      targetTable: "DB.RAW.ORDERS",
      targetTableDefinition: "create table ORDERS (ID NUMBER, NAME VARCHAR)",
      folderPath: "orders/daily",
      filePattern: ".*[.]csv",
      halted: false,
      errorMessage: null,
    });
    expect(warehouse.calls).toEqual(["pipe:RAW.ORDERS_PIPE", "table:DB.RAW.ORDERS"]);
  });

  it("halts and remembers a missing pipe", async () => {
    const state = await new PipeResolver(new FakeWarehouse()).resolve(initial());

    expect(state.halted).toBe(true);
    expect(state.pipeNotFound).toBe(true);
    expect(state.errorMessage).toBe(
      "Failed to get definition for pipe 'RAW.ORDERS_PIPE': Pipe RAW.ORDERS_PIPE not found.",
    );
  });

  it("halts without marking the pipe absent on a lookup error", async () => {
    const warehouse = new FakeWarehouse().setPipe("RAW", "ORDERS_PIPE", {
      status: "error",
      message: "Error fetching definition for Pipe RAW.ORDERS_PIPE: timeout",
    });

    const state = await new PipeResolver(warehouse).resolve(initial());

    expect(state.halted).toBe(true);
    expect(state.pipeNotFound).toBe(false);
  });

  it("halts when the definition has no COPY INTO target", async () => {
    const warehouse = new FakeWarehouse().setPipe("RAW", "ORDERS_PIPE", "create pipe P as select 1");

    const state = await new PipeResolver(warehouse).resolve(initial());

    expect(state.halted).toBe(true);
    expect(state.errorMessage).toBe("Could not extract target table name from pipe definition.");
  });

  it("keeps going with a soft error when the table definition is missing", async () => {
    const warehouse = new FakeWarehouse().setPipe("RAW", "ORDERS_PIPE", PIPE_DDL);

    const state = await new PipeResolver(warehouse).resolve(initial());

    expect(state.halted).toBe(false);
    expect(state.targetTableDefinition).toBeNull();
    expect(state.errorMessage).toBe(
      "Failed to get definition for target table 'DB.RAW.ORDERS': Table DB.RAW.ORDERS not found.",
    );
  });
});
