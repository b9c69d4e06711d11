import {
	GetObjectCommand,
	HeadObjectCommand,
	PutObjectCommand,
	S3Client,
} from "@aws-sdk/client-s3";
import type { AttachmentReference } from "@helpdesk/core-contracts";
import { type LoggerService, StorageError } from "@helpdesk/worker-base";
import { Injectable, type OnModuleDestroy } from "@nestjs/common";
import {
	type AttachmentStore,
	candidateNames,
	sha256Hex,
	storageFailure,
} from "./attachment.store.js";
import type { S3StorageConfig } from "./storage.config.js";

/** Object metadata key holding the sha256 of the stored bytes */
const HASH_METADATA_KEY = "sha256";

function isNotFound(error: unknown): boolean {
	return (
		error instanceof Error &&
		(error.name === "NotFound" || error.name === "NoSuchKey")
	);
}

/**
 * Attachments as objects under `s3://<bucket>/<prefix>/<ticketId>/<name>`
 */
@Injectable()
export class S3AttachmentStore implements AttachmentStore, OnModuleDestroy {
	private client: S3Client | null = null;

	constructor(
		private readonly config: S3StorageConfig,
		private readonly logger: LoggerService,
	) {}

	private getClient(): S3Client {
		if (this.client) {
			return this.client;
		}

		this.logger.lifecycle("Initializing S3 client for attachments", {
			endpoint: this.config.endpoint ?? "AWS S3",
			region: this.config.region,
			bucket: this.config.bucket,
		});

		this.client = new S3Client({
			endpoint: this.config.endpoint,
			region: this.config.region,
			...(this.config.credentials && { credentials: this.config.credentials }),
			forcePathStyle: this.config.forcePathStyle,
		});

		return this.client;
	}

	async save(
		ticketId: string,
		filename: string,
		bytes: Buffer,
		contentType: string,
		originalFilename = filename,
	): Promise<AttachmentReference> {
		const hash = sha256Hex(bytes);

		for (const name of candidateNames(filename)) {
			const key = this.objectKey(ticketId, name);
			const existingHash = await this.storedHash(key);

			if (existingHash === undefined) {
				await this.put(key, bytes, contentType, hash);
			} else if (existingHash !== hash) {
				continue;
			} else {
				this.logger.debug("Attachment already stored", {
					ticket_id: ticketId,
					stored_name: name,
				});
			}

			return {
				ticket_id: ticketId,
				stored_path: `s3://${this.config.bucket}/${key}`,
				stored_name: name,
				original_filename: originalFilename,
				content_type: contentType,
				size_bytes: bytes.length,
				content_hash: hash,
			};
		}

		throw new StorageError(
			`No free name for ${filename} under ticket ${ticketId}`,
			"ATTACHMENT_NAMES_EXHAUSTED",
		);
	}

	async read(reference: AttachmentReference): Promise<Buffer> {
		const { bucket, key } = this.parseUri(reference.stored_path);
		try {
			return await this.getBytes(bucket, key);
		} catch (error) {
			throw storageFailure("read attachment", reference.stored_path, error);
		}
	}

	async onModuleDestroy(): Promise<void> {
		if (this.client) {
			this.client.destroy();
			this.client = null;
		}
	}

	private objectKey(ticketId: string, name: string): string {
		return [this.config.prefix, ticketId, name].filter(Boolean).join("/");
	}

	/**
	 * sha256 of the object at `key`, or undefined when there is none
	 */
	private async storedHash(key: string): Promise<string | undefined> {
		try {
			const head = await this.getClient().send(
				new HeadObjectCommand({ Bucket: this.config.bucket, Key: key }),
				{ abortSignal: AbortSignal.timeout(this.config.timeoutMs) },
			);
			const recorded = head.Metadata?.[HASH_METADATA_KEY];
			if (recorded) return recorded;

			// Written by something else; compare the content itself
			return sha256Hex(await this.getBytes(this.config.bucket, key));
		} catch (error) {
			if (isNotFound(error)) return undefined;
			throw storageFailure("inspect attachment", key, error);
		}
	}

	private async getBytes(bucket: string, key: string): Promise<Buffer> {
		const response = await this.getClient().send(
			new GetObjectCommand({ Bucket: bucket, Key: key }),
			{ abortSignal: AbortSignal.timeout(this.config.timeoutMs) },
		);
		if (!response.Body) {
			throw new Error(`Empty response from S3 for ${key}`);
		}
		return Buffer.from(await response.Body.transformToByteArray());
	}

	private async put(
		key: string,
		bytes: Buffer,
		contentType: string,
		hash: string,
	): Promise<void> {
		try {
			await this.getClient().send(
				new PutObjectCommand({
					Bucket: this.config.bucket,
					Key: key,
					Body: bytes,
					ContentType: contentType,
					Metadata: { [HASH_METADATA_KEY]: hash },
				}),
				{ abortSignal: AbortSignal.timeout(this.config.timeoutMs) },
			);
		} catch (error) {
			throw storageFailure("write attachment", key, error);
		}
	}

	private parseUri(uri: string): { bucket: string; key: string } {
		const match = uri.match(/^s3:\/\/([^/]+)\/(.+)$/);
		if (!match?.[1] || !match[2]) {
			throw new StorageError(`Invalid S3 URI format: ${uri}`, "STORAGE_URI");
		}
		return { bucket: match[1], key: match[2] };
	}
}
