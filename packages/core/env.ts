import { LogLevels } from "consola"
import { z } from "zod"

export const schema = z.object({
	CRATE_INDEX_LOG_LEVEL: z
		.enum(["silent", "error", "warn", "info", "debug", "trace"])
		.optional()
		.default("info"),
})

export type Env = z.infer<typeof schema>

export function readEnv(source: Record<string, string | undefined> = process.env): Env {
	return schema.parse(source)
}

/** Numeric consola level for the configured log level name. */
export function consolaLevel(env: Env): number {
	return LogLevels[env.CRATE_INDEX_LOG_LEVEL]
}
