import { parseEnv } from "@helpdesk/worker-base";
import { z } from "zod";

export const MAILBOX_CONFIG = "MAILBOX_CONFIG";

const booleanFlag = (fallback: "true" | "false") =>
	z
		.enum(["true", "false"])
		.default(fallback)
		.transform((v) => v === "true");

const mailboxEnvSchema = z.object({
	MAIL_HOST: z.string().min(1),
	MAIL_PORT: z.coerce.number().int().positive().default(995),
	MAIL_TLS: booleanFlag("true"),
	MAIL_USER: z.string().min(1),
	MAIL_PASSWORD: z.string().min(1),
	MAIL_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
	MAIL_DELETE_AFTER_PROCESSING: booleanFlag("false"),
});

export interface MailboxConfig {
	host: string;
	port: number;
	tls: boolean;
	user: string;
	password: string;
	/** Upper bound for every POP3 command, connect and login included */
	timeoutMs: number;
	/** Issue DELE for each sealed message */
	deleteAfterProcessing: boolean;
}

export function createMailboxConfig(
	env: Record<string, string | undefined> = process.env,
): MailboxConfig {
	const parsed = parseEnv(mailboxEnvSchema, env, "mailbox");
	return {
		host: parsed.MAIL_HOST,
		port: parsed.MAIL_PORT,
		tls: parsed.MAIL_TLS,
		user: parsed.MAIL_USER,
		password: parsed.MAIL_PASSWORD,
		timeoutMs: parsed.MAIL_TIMEOUT_MS,
		deleteAfterProcessing: parsed.MAIL_DELETE_AFTER_PROCESSING,
	};
}
