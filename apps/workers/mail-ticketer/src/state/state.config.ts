import { resolve } from "node:path";
import { parseEnv } from "@helpdesk/worker-base";
import { z } from "zod";

export const STATE_CONFIG = "STATE_CONFIG";

const stateEnvSchema = z.object({
	STATE_BACKEND: z.enum(["file", "postgres"]).default("file"),
	STATE_DIR: z.string().min(1).default("./state"),
});

export interface StateConfig {
	/** `postgres` is required when more than one instance polls the mailbox */
	backend: "file" | "postgres";
	dir: string;
}

export function createStateConfig(
	env: Record<string, string | undefined> = process.env,
): StateConfig {
	const parsed = parseEnv(stateEnvSchema, env, "state");
	return { backend: parsed.STATE_BACKEND, dir: resolve(parsed.STATE_DIR) };
}
