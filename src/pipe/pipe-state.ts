import { emptySnapshot, type TableSnapshot } from "../warehouse/ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipeOutcome = "Pass" | "Fail" | "Error" | "Uncertain" | "Skipped";

export type PipeRunState = {
  pipeName: string;
  pipeSchema: string;
  pipeDefinition: string | null;
  /** Set when the definition lookup reported the pipe as absent. */
  pipeNotFound: boolean;
  targetTable: string | null;
  targetTableDefinition: string | null;
  /** Path inside the external stage; empty string means the stage root. */
  folderPath: string | null;
  filePattern: string | null;
  payload: string | null;
  payloadComment: string | null;
  filename: string | null;
  uploaded: boolean;
  verificationQuery: string | null;
  verificationCount: number | null;
  targetSnapshot: TableSnapshot;
  outcome: PipeOutcome | null;
  finalMessage: string | null;
  errorMessage: string | null;
  /** Set by a hard error; later stages skip their work. */
  halted: boolean;
  diagnostics: string[];
};

// =============================================================================
// HELPERS
// =============================================================================

export function createPipeRunState(args: { pipeName: string; pipeSchema: string }): PipeRunState {
  return {
    ...args,
    pipeDefinition: null,
    pipeNotFound: false,
    targetTable: null,
    targetTableDefinition: null,
    folderPath: null,
    filePattern: null,
    payload: null,
    payloadComment: null,
    filename: null,
    uploaded: false,
    verificationQuery: null,
    verificationCount: null,
    targetSnapshot: emptySnapshot(),
    outcome: null,
    finalMessage: null,
    errorMessage: null,
    halted: false,
    diagnostics: [],
  };
}

export function withDiagnostic(state: PipeRunState, message: string): PipeRunState {
  return { ...state, diagnostics: [...state.diagnostics, message] };
}

/** Records a hard error: replaces the error message and halts the run. */
export function haltWith(state: PipeRunState, message: string): PipeRunState {
  return { ...withDiagnostic(state, message), errorMessage: message, halted: true };
}

/** Records a soft error: appended to the error message, the run keeps going. */
export function noteSoftError(state: PipeRunState, message: string): PipeRunState {
  const errorMessage = state.errorMessage ? `${state.errorMessage}; ${message}` : message;
  return { ...withDiagnostic(state, message), errorMessage };
}

export function countGeneratedRows(payload: string): number {
  const lines = payload.trim().split("\n").length;
  return Math.max(lines - 1, 0);
}
