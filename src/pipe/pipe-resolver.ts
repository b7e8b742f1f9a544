import type { DefinitionLookup } from "../warehouse/ports.js";

import { haltWith, noteSoftError, withDiagnostic, type PipeRunState } from "./pipe-state.js";

// =============================================================================
// PATTERNS
// =============================================================================

const COPY_INTO_PATTERN = /COPY\s+INTO\s+([a-zA-Z0-9_."$]+)/i;
const STAGE_PATTERN = /FROM\s+@([a-zA-Z0-9_."$]+)\/?([a-zA-Z0-9_./-]*)\/?/i;
const FILE_PATTERN = /pattern\s*=>?\s*'([^']*)'/i;

export type PipeDetails = {
  targetTable: string | null;
  stageName: string | null;
  folderPath: string | null;
  filePattern: string | null;
};

export function extractPipeDetails(definition: string): PipeDetails {
  const copy = COPY_INTO_PATTERN.exec(definition);
  const stage = STAGE_PATTERN.exec(definition);
  const pattern = FILE_PATTERN.exec(definition);

  return {
    targetTable: copy ? copy[1].trim().replace(/"/g, "") : null,
    stageName: stage ? stage[1].trim() : null,
    folderPath: stage ? (stage[2] ?? "").replace(/^\/+|\/+$/g, "") : null,
    filePattern: pattern ? pattern[1] : null,
  };
}

// =============================================================================
// RESOLVER
// =============================================================================

export class PipeResolver {
  constructor(private readonly lookup: DefinitionLookup) {}

  async resolve(state: PipeRunState): Promise<PipeRunState> {
    if (state.halted) return state;

    const label = `${state.pipeSchema}.${state.pipeName}`;
    const pipe = await this.lookup.getPipeDefinition(state.pipeName, state.pipeSchema);
    if (pipe.status !== "found") {
      const halted = haltWith(state, `Failed to get definition for pipe '${label}': ${pipe.message}`);
      return { ...halted, pipeNotFound: pipe.status === "not_found" };
    }

    let next = withDiagnostic(
      { ...state, pipeDefinition: pipe.text },
      `Fetched pipe definition for ${label}.`,
    );

    const details = extractPipeDetails(pipe.text);
    if (!details.targetTable) {
      return haltWith(next, "Could not extract target table name from pipe definition.");
    }
    next = { ...next, targetTable: details.targetTable };

    if (details.folderPath === null) {
      return haltWith(next, "Could not extract stage path (FROM @stage/path) from pipe definition.");
    }
    next = withDiagnostic(
      { ...next, folderPath: details.folderPath },
      `Stage ${details.stageName ?? ""}, folder path "${details.folderPath}".`,
    );

    if (details.filePattern !== null) {
      next = withDiagnostic(
        { ...next, filePattern: details.filePattern },
        `Pipe uses file pattern: ${details.filePattern}`,
      );
    }

    const table = await this.lookup.getTableDefinition(details.targetTable);
    if (table.status !== "found") {
      return noteSoftError(
        next,
        `Failed to get definition for target table '${details.targetTable}': ${table.message}`,
      );
    }

    return withDiagnostic(
      { ...next, targetTableDefinition: table.text },
      `Fetched table definition for ${details.targetTable}.`,
    );
  }
}
