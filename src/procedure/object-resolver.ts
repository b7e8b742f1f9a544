import { formatErrorMessage } from "../core/error-format.js";
import { renderPromptTemplate } from "../core/prompts.js";
import type { LlmClient } from "../llm/client.js";
import type { DefinitionLookup, DefinitionResult } from "../warehouse/ports.js";

import { TABLE_ROLES, type ObjectKind, type ObjectRole, type ResolvedObject } from "./run-state.js";

// =============================================================================
// TYPES
// =============================================================================

export type ObjectResolverDeps = {
  oracle: LlmClient;
  lookup: DefinitionLookup;
};

export type ResolveObjectsResult = {
  objects: ResolvedObject[];
  diagnostics: string[];
};

type ParsedEntry = {
  kind: string;
  qualifiedName: string;
  role: string;
};

const EXCLUDED_PREFIXES = ["str_", "tmp_"];
const KIND_BY_LABEL: Partial<Record<string, ObjectKind>> = {
  TABLE: "table",
  VIEW: "view",
  PROCEDURE: "procedure",
};

// =============================================================================
// RESOLVER
// =============================================================================

export class ObjectResolver {
  constructor(private readonly deps: ObjectResolverDeps) {}

  async resolve(definition: string): Promise<ResolveObjectsResult> {
    const objects: ResolvedObject[] = [];
    const diagnostics: string[] = [];

    let listing: string;
    try {
      const prompt = await renderPromptTemplate("object-resolver", { definition });
      const completion = await this.deps.oracle.complete(prompt);
      listing = completion.text;
    } catch (err) {
      diagnostics.push(`Object extraction failed: ${formatErrorMessage(err)}`);
      return { objects, diagnostics };
    }

    const lines = listing
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    for (const line of lines) {
      try {
        const entry = parseEntryLine(line);
        if (!entry) {
          diagnostics.push(`Skipping malformed line (expected <kind>:<name>:<role>): ${line}`);
          continue;
        }

        const resolved = await this.resolveEntry(entry, diagnostics);
        if (resolved) {
          objects.push(resolved);
        }
      } catch (err) {
        diagnostics.push(`Unexpected error processing line "${line}": ${formatErrorMessage(err)}`);
      }
    }

    return { objects, diagnostics };
  }

  private async resolveEntry(
    entry: ParsedEntry,
    diagnostics: string[],
  ): Promise<ResolvedObject | null> {
    const { qualifiedName } = entry;

    if (isExcludedName(qualifiedName)) {
      diagnostics.push(`Skipping stream or temporary object: ${qualifiedName}`);
      return null;
    }

    const kind = KIND_BY_LABEL[entry.kind];
    if (!kind) {
      diagnostics.push(`Unknown object kind ${entry.kind} for ${qualifiedName}`);
      return null;
    }

    let result: DefinitionResult;
    if (kind === "procedure") {
      const segments = qualifiedName.split(".");
      if (segments.length < 2) {
        diagnostics.push(`Could not parse schema and name from procedure ${qualifiedName}`);
        return null;
      }
      const [schema, name] = segments.slice(-2);
      result = await this.deps.lookup.getProcedureDefinition(name, schema);
    } else {
      result = await this.deps.lookup.getTableDefinition(qualifiedName);
    }

    if (result.status !== "found") {
      diagnostics.push(
        `Failed to fetch definition for ${entry.kind} ${qualifiedName}: ${result.message}`,
      );
      return null;
    }

    return {
      qualifiedName,
      kind,
      role: resolveRole(kind, entry.role, qualifiedName, diagnostics),
      definition: result.text,
    };
  }
}

// =============================================================================
// PARSING
// =============================================================================

export function parseEntryLine(line: string): ParsedEntry | null {
  const parts = line.split(":");
  if (parts.length !== 3) {
    return null;
  }

  const [kind, qualifiedName, role] = parts.map((part) => part.trim());
  if (!kind || !qualifiedName) {
    return null;
  }

  return { kind: kind.toUpperCase(), qualifiedName, role: role.toLowerCase() };
}

export function isExcludedName(qualifiedName: string): boolean {
  const segments = qualifiedName.split(".");
  const local = segments[segments.length - 1].replace(/"/g, "").trim().toLowerCase();
  return EXCLUDED_PREFIXES.some((prefix) => local.startsWith(prefix));
}

function resolveRole(
  kind: ObjectKind,
  role: string,
  qualifiedName: string,
  diagnostics: string[],
): ObjectRole {
  if (kind !== "table") {
    return "n/a";
  }

  const match = TABLE_ROLES.find((candidate) => candidate === role);
  if (match) {
    return match;
  }

  diagnostics.push(`Table ${qualifiedName} has unrecognized role "${role}"; using n/a.`);
  return "n/a";
}
