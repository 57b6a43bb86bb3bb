import { z } from "zod";

export const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  MUSTER_DB_PATH: z.string().min(1).default(":memory:"),
  MUSTER_CONFIG_DIR: z.string().min(1).optional(),
  MUSTER_START_DATE: isoDate.default("3025-01-01"),
  MUSTER_SEED: z.string().min(1).optional(),
  MUSTER_EVENT_LOG_CAPACITY: z.coerce.number().int().min(0).optional(),
});

export type HostConfig = z.infer<typeof envSchema>;

export function loadHostConfig(env: NodeJS.ProcessEnv = process.env): HostConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`invalid environment: ${issue.path.join(".")}: ${issue.message}`);
  }
  return result.data;
}
