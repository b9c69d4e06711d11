import { resolve } from "node:path";
import { parseEnv } from "@helpdesk/worker-base";
import { z } from "zod";

export const STORAGE_CONFIG = "STORAGE_CONFIG";

const storageEnvSchema = z
	.object({
		ATTACHMENT_BACKEND: z.enum(["filesystem", "s3"]).default("filesystem"),
		ATTACH_DIR: z.string().min(1).default("./attachments"),
		S3_BUCKET: z.string().min(1).optional(),
		S3_PREFIX: z.string().default("tickets"),
		S3_ENDPOINT: z.string().url().optional(),
		AWS_REGION: z.string().default("us-east-1"),
		AWS_ACCESS_KEY_ID: z.string().optional(),
		AWS_SECRET_ACCESS_KEY: z.string().optional(),
		S3_FORCE_PATH_STYLE: z
			.enum(["true", "false"])
			.default("false")
			.transform((v) => v === "true"),
		STORAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
	})
	.superRefine((env, ctx) => {
		if (env.ATTACHMENT_BACKEND === "s3" && !env.S3_BUCKET) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["S3_BUCKET"],
				message: "is required when ATTACHMENT_BACKEND=s3",
			});
		}
	});

export interface FilesystemStorageConfig {
	backend: "filesystem";
	rootDir: string;
	timeoutMs: number;
}

export interface S3StorageConfig {
	backend: "s3";
	bucket: string;
	prefix: string;
	endpoint: string | undefined;
	region: string;
	credentials?: { accessKeyId: string; secretAccessKey: string };
	forcePathStyle: boolean;
	timeoutMs: number;
}

export type StorageConfig = FilesystemStorageConfig | S3StorageConfig;

export function createStorageConfig(
	env: Record<string, string | undefined> = process.env,
): StorageConfig {
	const parsed = parseEnv(storageEnvSchema, env, "storage");

	if (parsed.ATTACHMENT_BACKEND === "filesystem" || !parsed.S3_BUCKET) {
		return {
			backend: "filesystem",
			rootDir: resolve(parsed.ATTACH_DIR),
			timeoutMs: parsed.STORAGE_TIMEOUT_MS,
		};
	}

	return {
		backend: "s3",
		bucket: parsed.S3_BUCKET,
		prefix: parsed.S3_PREFIX.replace(/^\/+|\/+$/g, ""),
		endpoint: parsed.S3_ENDPOINT,
		region: parsed.AWS_REGION,
		...(parsed.AWS_ACCESS_KEY_ID &&
			parsed.AWS_SECRET_ACCESS_KEY && {
				credentials: {
					accessKeyId: parsed.AWS_ACCESS_KEY_ID,
					secretAccessKey: parsed.AWS_SECRET_ACCESS_KEY,
				},
			}),
		forcePathStyle: parsed.S3_FORCE_PATH_STYLE,
		timeoutMs: parsed.STORAGE_TIMEOUT_MS,
	};
}
