import { describe, expect, it } from "vitest";

import { NotFoundError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { debugRequested, renderCliError } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config error",
    message: "Missing warehouse account",
    hint: "Run sqlprobe init",
    next: "Edit ~/.sqlprobe/config.yaml",
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without stack output", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Config error",
        "Missing warehouse account",
        "Hint: Run sqlprobe init",
        "Next: Edit ~/.sqlprobe/config.yaml",
      ].join("\n"),
    );
  });

  it("includes debug details and stack output when debug is enabled", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.execution,
      title: "Test execution failed.",
      message: "Warehouse stopped",
      cause: new Error("boom"),
    });
    error.stack = "UserFacingError: Warehouse stopped\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Test execution failed.",
        "Warehouse stopped",
        "Code: EXECUTION_ERROR",
        "Name: UserFacingError",
        "Cause: boom",
        "Stack:",
        "  UserFacingError: Warehouse stopped",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("maps taxonomy errors onto user-facing titles", () => {
    const error = new NotFoundError("Procedure SALES.LOAD_ORDERS not found.");

    const output = renderCliError(error, { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Object not found.",
        "Procedure SALES.LOAD_ORDERS not found.",
        "Hint: Check the schema and object name, and that the configured role can see it.",
      ].join("\n"),
    );
  });

  it("reports the wrapped cause of a taxonomy error in debug mode", () => {
    const error = new NotFoundError("Pipe missing.", new Error("lookup said no"));
    error.stack = "NotFoundError: Pipe missing.";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output.split("\n").slice(3)).toEqual([
      "Code: NOT_FOUND",
      "Name: NotFoundError",
      "Cause: lookup said no",
      "Stack:",
      "  NotFoundError: Pipe missing.",
    ]);
  });

  it("disables color for non-TTY output even when useColor is true", () => {
    const output = renderCliError(buildUserFacingError(), {
      stream: nonTtyStream,
      useColor: true,
    });

    expect(output).toContain("Error: Config error");
    expect(output).not.toContain("\x1b[");
  });

  it("colors the title on a TTY", () => {
    const output = renderCliError(buildUserFacingError(), {
      stream: { isTTY: true },
      useColor: true,
    });

    expect(output.split("\n")[0]).toBe(
      "\x1b[1m\x1b[31mError:\x1b[39m\x1b[22m \x1b[1mConfig error\x1b[22m",
    );
  });
});

describe("debugRequested", () => {
  it("takes the last debug flag before the argument separator", () => {
    expect(debugRequested(["node", "sqlprobe", "--debug", "--no-debug"])).toBe(false);
    expect(debugRequested(["--no-debug", "pipe", "--debug"])).toBe(true);
    expect(debugRequested(["node", "sqlprobe", "--", "--debug"])).toBeUndefined();
    expect(debugRequested(["node", "sqlprobe", "procedure"])).toBeUndefined();
  });
});
