import { createHash, randomUUID } from "node:crypto";
import { link, mkdir, readFile, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { AttachmentReference } from "@helpdesk/core-contracts";
import {
	type LoggerService,
	StorageError,
	systemErrorCode,
	toError,
} from "@helpdesk/worker-base";
import { splitExtension } from "../extraction/filename.js";

export const ATTACHMENT_STORE = "ATTACHMENT_STORE";

/**
 * Persists attachment bytes under one location per (ticket, filename)
 */
export interface AttachmentStore {
	/**
	 * Store `bytes` for the ticket. A name already holding different bytes
	 * gets a ` (n)` suffix; one already holding the same bytes is reused.
	 */
	save(
		ticketId: string,
		filename: string,
		bytes: Buffer,
		contentType: string,
		originalFilename?: string,
	): Promise<AttachmentReference>;
	read(reference: AttachmentReference): Promise<Buffer>;
}

const MAX_NAME_ATTEMPTS = 1000;

/**
 * `invoice.pdf`, `invoice (1).pdf`, `invoice (2).pdf`, ...
 */
export function* candidateNames(filename: string): Generator<string> {
	yield filename;
	const [root, ext] = splitExtension(filename);
	for (let n = 1; n < MAX_NAME_ATTEMPTS; n++) {
		yield `${root} (${n})${ext}`;
	}
}

export function sha256Hex(bytes: Buffer): string {
	return createHash("sha256").update(bytes).digest("hex");
}

export function storageFailure(
	action: string,
	target: string,
	error: unknown,
): StorageError {
	const err = toError(error);
	return new StorageError(
		`Failed to ${action} ${target}: ${err.message}`,
		systemErrorCode(err) ?? "STORAGE",
		{ cause: err },
	);
}

/**
 * Attachments as plain files under `<rootDir>/<ticketId>/`.
 *
 * Bytes are written to a temp file first and hard-linked into place, so a
 * name is either absent or fully written.
 */
export class FilesystemAttachmentStore implements AttachmentStore {
	constructor(
		private readonly rootDir: string,
		private readonly timeoutMs: number,
		private readonly logger: LoggerService,
	) {}

	async save(
		ticketId: string,
		filename: string,
		bytes: Buffer,
		contentType: string,
		originalFilename = filename,
	): Promise<AttachmentReference> {
		const dir = join(this.rootDir, ticketId);
		const hash = sha256Hex(bytes);
		const tmp = join(dir, `.${randomUUID()}.tmp`);

		try {
			await mkdir(dir, { recursive: true });
			await writeFile(tmp, bytes, {
				signal: AbortSignal.timeout(this.timeoutMs),
			});
		} catch (error) {
			await this.discard(tmp);
			throw storageFailure("write attachment", join(dir, filename), error);
		}

		try {
			for (const name of candidateNames(filename)) {
				const path = join(dir, name);
				try {
					await link(tmp, path);
				} catch (error) {
					if (systemErrorCode(toError(error)) !== "EEXIST") throw error;
					if (sha256Hex(await readFile(path)) !== hash) continue;
					this.logger.debug("Attachment already stored", {
						ticket_id: ticketId,
						stored_name: name,
					});
				}

				return {
					ticket_id: ticketId,
					stored_path: path,
					stored_name: name,
					original_filename: originalFilename,
					content_type: contentType,
					size_bytes: bytes.length,
					content_hash: hash,
				};
			}
		} catch (error) {
			throw storageFailure("store attachment", join(dir, filename), error);
		} finally {
			await this.discard(tmp);
		}

		throw new StorageError(
			`No free name for ${filename} under ${dir}`,
			"ATTACHMENT_NAMES_EXHAUSTED",
		);
	}

	async read(reference: AttachmentReference): Promise<Buffer> {
		try {
			return await readFile(reference.stored_path, {
				signal: AbortSignal.timeout(this.timeoutMs),
			});
		} catch (error) {
			throw storageFailure("read attachment", reference.stored_path, error);
		}
	}

	private async discard(path: string): Promise<void> {
		try {
			await unlink(path);
		} catch (error) {
			if (systemErrorCode(toError(error)) !== "ENOENT") {
				this.logger.warn("Could not remove temporary attachment file", {
					path,
					error_message: toError(error).message,
				});
			}
		}
	}
}
