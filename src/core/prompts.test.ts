import { describe, expect, it } from "vitest";

import { GenerationError } from "./errors.js";
import { renderPromptTemplate } from "./prompts.js";

describe("renderPromptTemplate", () => {
  it("renders the object resolver prompt around the definition", async () => {
    const prompt = await renderPromptTemplate("object-resolver", {
      definition: "CREATE PROCEDURE MART.LOAD_FACTS() AS $$ INSERT INTO MART.FACTS SELECT 1 $$;",
    });

    expect(prompt).toContain("<kind>:<fully-qualified-name>:<role>");
    expect(prompt).toContain("INSERT INTO MART.FACTS SELECT 1");
  });

  it("renders the fixture synthesizer prompt without escaping SQL", async () => {
    const prompt = await renderPromptTemplate("fixture-synthesizer", {
      procedure_name: "LOAD_FACTS",
      procedure_schema: "MART",
      context: "WHERE amount > 0 AND note <> '' & more",
    });

    expect(prompt).toContain("Procedure name: LOAD_FACTS");
    expect(prompt).toContain("Procedure schema: MART");
    expect(prompt).toContain("WHERE amount > 0 AND note <> '' & more");
  });

  it("renders the feed generator prompt", async () => {
    const prompt = await renderPromptTemplate("feed-generator", {
      target_table: "RAW.EVENTS",
      table_definition: "CREATE TABLE RAW.EVENTS (ID NUMBER);",
      pipe_definition: "CREATE PIPE RAW.EVENTS_PIPE AS COPY INTO RAW.EVENTS FROM @RAW.STG/events/;",
    });

    expect(prompt).toContain("Target table: RAW.EVENTS");
    expect(prompt).toContain("COPY INTO RAW.EVENTS FROM @RAW.STG/events/;");
  });

  it("fails with a generation error when a value the template names is missing", async () => {
    const error = await renderPromptTemplate("feed-generator", { target_table: "RAW.EVENTS" }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({
      message: expect.stringMatching(/^Could not render the feed-generator prompt: /),
    });
  });

  it("passes mustache-looking text inside a definition through unchanged", async () => {
    const prompt = await renderPromptTemplate("object-resolver", {
      definition: "CREATE PROCEDURE MART.P() LANGUAGE JAVASCRIPT AS $$ var m = '{{run_id}}'; $$;",
    });

    expect(prompt).toContain("var m = '{{run_id}}';");
  });
});
