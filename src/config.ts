import { z } from "zod";
import { ValidationError } from "./errors";
import { formatIssues } from "./util/format-issues";

export const DEFAULT_MAX_STEPS = 100;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const EngineConfigSchema = z.object({
    maxSteps: z.number().int().nonnegative().default(DEFAULT_MAX_STEPS),
    logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

const EnvSchema = z.object({
    WORKFLOW_MAX_STEPS: z.coerce.number().int().nonnegative().optional(),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

/**
 * Reads engine settings from environment variables.
 *
 * - `WORKFLOW_MAX_STEPS`: default step bound for runs (100)
 * - `LOG_LEVEL`: pino level (`info`)
 *
 * @throws {ValidationError} If a variable is present but malformed
 *
 * @example
 * ```typescript
 * const config = loadEngineConfig(process.env);
 * const engine = new ExecutionEngine(context, config);
 * ```
 */
export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
    const parsed = EnvSchema.safeParse({
        WORKFLOW_MAX_STEPS: emptyToUndefined(env.WORKFLOW_MAX_STEPS),
        LOG_LEVEL: emptyToUndefined(env.LOG_LEVEL),
    });
    if (!parsed.success) {
        throw new ValidationError("Invalid engine configuration", formatIssues(parsed.error));
    }
    return EngineConfigSchema.parse({
        maxSteps: parsed.data.WORKFLOW_MAX_STEPS,
        logLevel: parsed.data.LOG_LEVEL,
    });
}

function emptyToUndefined(value: string | undefined): string | undefined {
    return value === undefined || value.trim() === "" ? undefined : value;
}
