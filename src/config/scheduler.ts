import { z } from "zod";
import type { ScheduleMode } from "@/types/scheduler";

export interface SchedulerConfig {
  mode: ScheduleMode;
  defaultQuantum: number;
  strict: boolean;
  debug: boolean;
}

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

// `VITE_DEFAULT_QUANTUM=` in a .env file arrives as "", which should mean "unset".
const unsetWhenBlank = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema);

const envSchema = z.object({
  VITE_SCHEDULER_MODE: unsetWhenBlank(z.enum(["reference", "corrected"]).default("reference")),
  VITE_DEFAULT_QUANTUM: unsetWhenBlank(z.coerce.number().int().positive().default(2)),
  VITE_SCHEDULER_STRICT: unsetWhenBlank(flag.default("true")),
  VITE_SCHEDULER_DEBUG: unsetWhenBlank(flag.default("false")),
});

export const loadSchedulerConfig = (env: Record<string, unknown>): SchedulerConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid scheduler configuration: ${issues}`);
  }

  return {
    mode: parsed.data.VITE_SCHEDULER_MODE,
    defaultQuantum: parsed.data.VITE_DEFAULT_QUANTUM,
    strict: parsed.data.VITE_SCHEDULER_STRICT,
    debug: parsed.data.VITE_SCHEDULER_DEBUG,
  };
};

export const schedulerConfig: SchedulerConfig = loadSchedulerConfig(import.meta.env);
