import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { formatErrorMessage } from "./error-format.js";
import { GenerationError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type PromptTemplateName = "object-resolver" | "fixture-synthesizer" | "feed-generator";

export type PromptTemplateValues = Record<string, string>;

// Run from src/core under vitest and from dist/src/core once built.
const PROMPT_DIR_CANDIDATES = ["../../templates/prompts/", "../../../templates/prompts/"];

const compiledTemplates = new Map<PromptTemplateName, Handlebars.TemplateDelegate>();

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Renders a prompt. Values are inserted verbatim, so DDL that itself contains
 * `{{...}}` reaches the oracle untouched; a value the template names but the
 * caller omits fails under Handlebars strict mode.
 */
export async function renderPromptTemplate(
  name: PromptTemplateName,
  values: PromptTemplateValues,
): Promise<string> {
  const template = await compiledTemplate(name);
  try {
    return template(values).trim();
  } catch (err) {
    throw new GenerationError(`Could not render the ${name} prompt: ${formatErrorMessage(err)}`, err);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function compiledTemplate(name: PromptTemplateName): Promise<Handlebars.TemplateDelegate> {
  const cached = compiledTemplates.get(name);
  if (cached) return cached;

  const source = await fse.readFile(await locateTemplate(name), "utf8");
  const compiled = Handlebars.compile(source, { noEscape: true, strict: true });
  compiledTemplates.set(name, compiled);
  return compiled;
}

async function locateTemplate(name: PromptTemplateName): Promise<string> {
  const candidates = PROMPT_DIR_CANDIDATES.map((dir) =>
    fileURLToPath(new URL(`${dir}${name}.md`, import.meta.url)),
  );

  for (const candidate of candidates) {
    if (await fse.pathExists(candidate)) return candidate;
  }
  throw new GenerationError(`Prompt template ${name}.md not found (looked in ${candidates.join(", ")}).`);
}
