import { describe, expect, it } from "vitest";

import { FakeOracle } from "../__tests__/fakes.js";

import { FixtureBatchJsonSchema } from "./fixture-schema.js";
import { FixtureSynthesizer, buildFixtureContext } from "./fixture-synthesizer.js";
import type { ResolvedObject } from "./run-state.js";

const PROCEDURE = { name: "LOAD_ORDER_FACTS", schema: "MART" };
const DEFINITION = "BEGIN MERGE INTO MART.ORDER_FACTS USING RAW.ORDERS ...; END";

const OBJECTS: ResolvedObject[] = [
  { qualifiedName: "DB.RAW.ORDERS", kind: "table", role: "source", definition: "create table ORDERS (ID NUMBER)" },
  { qualifiedName: "DB.MART.ORDER_FACTS", kind: "table", role: "target", definition: "create table ORDER_FACTS (ID NUMBER)" },
  { qualifiedName: "DB.MART.ACTIVE_ORDERS", kind: "view", role: "n/a", definition: "create view ACTIVE_ORDERS as select 1" },
];

function testCase(name: string, expectedCount: string | number): Record<string, unknown> {
  return {
    test_case: name,
    brief_description: `${name} description`,
    insert_query: "INSERT INTO DB.RAW.ORDERS (ID) VALUES (1);",
    source_table: "DB.RAW.ORDERS",
    expected_behaviour: "One row lands in the target table.",
    validation_query: "SELECT COUNT(*) FROM DB.MART.ORDER_FACTS WHERE ID = 1;",
    expected_count: expectedCount,
    target_table: "DB.MART.ORDER_FACTS",
  };
}

describe("FixtureSynthesizer", () => {
  it("maps a valid batch into fixtures and requests the strict schema", async () => {
    const oracle = new FakeOracle([
      { parsed: { test_cases: [testCase("insert path", "1"), testCase("update path", 1)] } },
    ]);

    const result = await new FixtureSynthesizer(oracle).synthesize(PROCEDURE, DEFINITION, OBJECTS);

    expect(result.diagnostics).toEqual([]);
    expect(result.fixtures).toHaveLength(2);
    expect(result.fixtures[0]).toEqual({
      name: "insert path",
      description: "insert path description",
      insertQuery: "INSERT INTO DB.RAW.ORDERS (ID) VALUES (1);",
      sourceTable: "DB.RAW.ORDERS",
      expectedBehaviour: "One row lands in the target table.",
      validationQuery: "SELECT COUNT(*) FROM DB.MART.ORDER_FACTS WHERE ID = 1;",
      expectedCount: "1",
      targetTable: "DB.MART.ORDER_FACTS",
    });
    expect(result.fixtures[1]?.expectedCount).toBe("1");
    expect(oracle.options[0]).toEqual({ schema: FixtureBatchJsonSchema });
    expect(oracle.prompts[0]).toContain("Procedure name: LOAD_ORDER_FACTS");
    expect(oracle.prompts[0]).toContain("**Source Tables:**\nDB.RAW.ORDERS:");
  });

  it("parses fenced JSON text when no structured payload is returned", async () => {
    const body = JSON.stringify({ test_cases: [testCase("insert path", "1"), testCase("update path", "2")] });
    const oracle = new FakeOracle([{ text: "```json\n" + body + "\n```" }]);

    const result = await new FixtureSynthesizer(oracle).synthesize(PROCEDURE, DEFINITION, OBJECTS);

    expect(result.fixtures.map((fixture) => fixture.expectedCount)).toEqual(["1", "2"]);
  });

  it("accepts a fixture count other than two with a diagnostic", async () => {
    const oracle = new FakeOracle([{ parsed: { test_cases: [testCase("insert path", "1")] } }]);

    const result = await new FixtureSynthesizer(oracle).synthesize(PROCEDURE, DEFINITION, OBJECTS);

    expect(result.fixtures).toHaveLength(1);
    expect(result.diagnostics).toEqual(["Expected 2 fixtures but the oracle returned 1."]);
  });

  it("returns no fixtures when the response violates the schema", async () => {
    const extra = { ...testCase("insert path", "1"), priority: "high" };
    const oracle = new FakeOracle([{ parsed: { test_cases: [extra] } }]);

    const result = await new FixtureSynthesizer(oracle).synthesize(PROCEDURE, DEFINITION, OBJECTS);

    expect(result.fixtures).toEqual([]);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatch(
      /^Fixture generation failed: Fixture synthesizer output failed schema validation: test_cases\.0: /,
    );
  });

  it("returns no fixtures when the oracle fails", async () => {
    const oracle = new FakeOracle([new Error("upstream timeout")]);

    const result = await new FixtureSynthesizer(oracle).synthesize(PROCEDURE, DEFINITION, OBJECTS);

    expect(result).toEqual({ fixtures: [], diagnostics: ["Fixture generation failed: upstream timeout"] });
  });

  it("returns no fixtures when the text is not JSON", async () => {
    const oracle = new FakeOracle([{ text: "Sure! Here are two tests." }]);

    const result = await new FixtureSynthesizer(oracle).synthesize(PROCEDURE, DEFINITION, OBJECTS);

    expect(result.diagnostics).toEqual([
      "Fixture generation failed: Fixture synthesizer returned invalid JSON.",
    ]);
  });
});

describe("buildFixtureContext", () => {
  it("groups objects by role and kind", () => {
    const context = buildFixtureContext(PROCEDURE, "BODY", [
      ...OBJECTS,
      { qualifiedName: "DB.REF.CUSTOMERS", kind: "table", role: "master", definition: "M" },
      { qualifiedName: "DB.REF.MISC", kind: "table", role: "n/a", definition: "X" },
    ]);

    expect(context).toBe(
      [
        "Procedure DDL (MART.LOAD_ORDER_FACTS):",
        "```sql",
        "BODY",
        "```",
        "",
        "Related Object DDLs by Role/Type:",
        "",
        "**Source Tables:**",
        "DB.RAW.ORDERS:",
        "```sql",
        "create table ORDERS (ID NUMBER)",
        "```",
        "",
        "**Target Tables:**",
        "DB.MART.ORDER_FACTS:",
        "```sql",
        "create table ORDER_FACTS (ID NUMBER)",
        "```",
        "",
        "**Master Tables:**",
        "DB.REF.CUSTOMERS:",
        "```sql",
        "M",
        "```",
        "",
        "**Other Objects (Views/Procedures/Misc Tables):**",
        "-- VIEW",
        "DB.MART.ACTIVE_ORDERS:",
        "```sql",
        "create view ACTIVE_ORDERS as select 1",
        "```",
        "",
        "-- TABLE (Role: n/a)",
        "DB.REF.MISC:",
        "```sql",
        "X",
        "```",
        "",
        "",
      ].join("\n"),
    );
  });

  it("notes when no related objects were found", () => {
    expect(buildFixtureContext(PROCEDURE, "BODY", [])).toBe(
      "Procedure DDL (MART.LOAD_ORDER_FACTS):\n```sql\nBODY\n```\n\nNo related object DDLs were found.\n",
    );
  });
});
