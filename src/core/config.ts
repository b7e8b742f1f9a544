import { z } from "zod";

// =============================================================================
// SECTIONS
// =============================================================================

export const LLM_PROVIDERS = ["openai", "anthropic", "mock"] as const;

const LlmSchema = z
  .object({
    provider: z.enum(LLM_PROVIDERS).default("openai"),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2).optional(),
    timeout_seconds: z.number().int().positive().default(120),
    base_url: z.string().url().optional(),
  })
  .strict();

const WarehouseSchema = z
  .object({
    account: z.string().min(1),
    username: z.string().min(1),
    password: z.string().min(1),
    warehouse: z.string().min(1),
    database: z.string().min(1),
    schema: z.string().min(1).optional(),
    role: z.string().min(1).optional(),
  })
  .strict();

const StorageSchema = z
  .object({
    connection_string: z.string().min(1),
    container: z.string().min(1),
  })
  .strict();

const PipeSchema = z
  .object({
    // Snowpipe auto-ingest usually lands files within half a minute.
    settle_seconds: z.number().nonnegative().default(35),
  })
  .strict();

// =============================================================================
// PROJECT CONFIG
// =============================================================================

export const ProjectConfigSchema = z
  .object({
    llm: LlmSchema,
    warehouse: WarehouseSchema,
    storage: StorageSchema.optional(),
    pipe: PipeSchema.default({}),
    reports_dir: z.string().min(1).optional(),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type LlmConfig = ProjectConfig["llm"];
export type WarehouseConfig = ProjectConfig["warehouse"];
export type StorageConfig = NonNullable<ProjectConfig["storage"]>;

export type ResolvedProjectConfig = Omit<ProjectConfig, "reports_dir"> & {
  reports_dir: string;
};
