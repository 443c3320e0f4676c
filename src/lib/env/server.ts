import { z } from "zod";

const flag = z
  .string()
  .optional()
  .transform((v) => v === "1" || v?.trim().toLowerCase() === "true");

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const ServerEnvSchema = z.object({
  // Record store (required)
  MONDAY_API_KEY: z.string().trim().min(1),
  MONDAY_BOARD_ID: z.string().trim().min(1),
  MONDAY_API_URL: z.string().url().default("https://api.monday.com/v2"),

  // Sync behaviour
  DRY_RUN: flag,
  FIELD_MAP_PATH: z.string().min(1).default("config/board-fields.json"),
  ITEMS_LIMIT: positiveInt(100),

  // Resilience
  MAX_ATTEMPTS: positiveInt(5),
  RETRY_BASE_MS: positiveInt(1_000),
  HTTP_TIMEOUT_MS: positiveInt(30_000),
  WRITE_CONCURRENCY: positiveInt(1),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

export function serverEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  const parsed = ServerEnvSchema.safeParse(source);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("❌ Invalid server env:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid server environment variables (see logs).");
  }
  return parsed.data;
}
