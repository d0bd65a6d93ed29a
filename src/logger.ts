import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

/**
 * Creates the JSON logger used by the engine and the stores.
 * Output is silenced under Vitest or `NODE_ENV=test`.
 *
 * @param bindings - Fields attached to every line (e.g. `{ component: "engine" }`)
 * @param level - Minimum level; falls back to `LOG_LEVEL`, then `info`
 */
export function makeLogger(bindings?: Record<string, unknown>, level?: string): Logger {
    const isVitest = process.env.VITEST === "true";
    const nodeEnv = process.env.NODE_ENV ?? "development";

    return pino({
        level: level ?? process.env.LOG_LEVEL ?? "info",
        enabled: !(isVitest || nodeEnv === "test"),
        base: { ...bindings, service: "guarded-graph-runner" },
        messageKey: "msg",
        timestamp: pino.stdTimeFunctions.isoTime,
    });
}

/** Logger that keeps the pino interface but writes nothing. */
export function makeNoopLogger(): Logger {
    return pino({ enabled: false });
}
