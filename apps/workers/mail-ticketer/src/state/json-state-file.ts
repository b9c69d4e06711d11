import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import { dirname } from "node:path";
import {
	StateCorruptError,
	StorageError,
	systemErrorCode,
	toError,
} from "@helpdesk/worker-base";
import type { ZodType, ZodTypeDef } from "zod";

/**
 * A JSON document on disk, validated on read and replaced atomically on
 * write (temp file, fsync, rename)
 */
export class JsonStateFile<T> {
	constructor(
		readonly path: string,
		private readonly schema: ZodType<T, ZodTypeDef, unknown>,
		private readonly empty: () => T,
	) {}

	/**
	 * The stored document, or the empty value when the file does not exist.
	 * Anything unreadable is a StateCorruptError: it is never reset silently.
	 */
	async read(): Promise<T> {
		let text: string;
		try {
			text = await readFile(this.path, "utf8");
		} catch (error) {
			if (systemErrorCode(toError(error)) === "ENOENT") {
				return this.empty();
			}
			throw new StateCorruptError(this.path, toError(error).message, {
				cause: error,
			});
		}

		let data: unknown;
		try {
			data = JSON.parse(text);
		} catch (error) {
			throw new StateCorruptError(this.path, "not valid JSON", { cause: error });
		}

		const result = this.schema.safeParse(data);
		if (!result.success) {
			const issue = result.error.errors[0];
			throw new StateCorruptError(
				this.path,
				issue
					? `unexpected shape at ${issue.path.join(".") || "root"}: ${issue.message}`
					: "unexpected shape",
			);
		}

		return result.data;
	}

	async write(value: T): Promise<void> {
		const tmp = `${this.path}.${process.pid}.tmp`;
		try {
			await mkdir(dirname(this.path), { recursive: true });
			const handle = await open(tmp, "w");
			try {
				await handle.writeFile(`${JSON.stringify(value, null, 2)}\n`, "utf8");
				await handle.sync();
			} finally {
				await handle.close();
			}
			await rename(tmp, this.path);
		} catch (error) {
			await rm(tmp, { force: true });
			const err = toError(error);
			throw new StorageError(
				`Failed to write state file ${this.path}: ${err.message}`,
				systemErrorCode(err) ?? "STATE_WRITE",
				{ cause: err },
			);
		}
	}
}
