const UNSAFE_CHARACTERS = /[\\/*?:"<>|\u0000-\u001f\u007f]/g;
const MAX_LENGTH = 150;

/**
 * Split `invoice.pdf` into `invoice` and `.pdf`; names without a dot, or
 * with only a leading one, have no extension
 */
export function splitExtension(name: string): [string, string] {
	const dot = name.lastIndexOf(".");
	if (dot <= 0) return [name, ""];
	return [name.slice(0, dot), name.slice(dot)];
}

/**
 * Make an attachment name safe to use as a single path segment
 */
export function sanitizeFilename(name: string, fallback: string): string {
	let safe = name
		.replace(UNSAFE_CHARACTERS, "")
		.replace(/\s+/g, " ")
		.trim()
		.replace(/^\.+/, "")
		.trim();

	if (safe.length > MAX_LENGTH) {
		const [root, ext] = splitExtension(safe);
		const keptExt = ext.slice(0, 10);
		safe = root.slice(0, MAX_LENGTH - keptExt.length) + keptExt;
	}

	return safe || fallback;
}
