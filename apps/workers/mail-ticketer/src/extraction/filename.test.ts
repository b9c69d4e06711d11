import { describe, expect, it } from "vitest";
import { sanitizeFilename, splitExtension } from "./filename.js";

describe("splitExtension", () => {
	it("should split on the last dot", () => {
		expect(splitExtension("invoice.pdf")).toEqual(["invoice", ".pdf"]);
		expect(splitExtension("archive.tar.gz")).toEqual(["archive.tar", ".gz"]);
	});

	it("should treat dotless and dot-leading names as extensionless", () => {
		expect(splitExtension("README")).toEqual(["README", ""]);
		expect(splitExtension(".profile")).toEqual([".profile", ""]);
	});
});

describe("sanitizeFilename", () => {
	it("should keep ordinary names unchanged", () => {
		expect(sanitizeFilename("invoice.pdf", "attachment-1")).toBe("invoice.pdf");
	});

	it("should remove path separators and reserved characters", () => {
		expect(sanitizeFilename('re:port*?"<>|.pdf', "attachment-1")).toBe("report.pdf");
		expect(sanitizeFilename("../../etc/passwd", "attachment-1")).toBe("etcpasswd");
	});

	it("should collapse whitespace runs", () => {
		expect(sanitizeFilename("  quarterly   report .xlsx ", "attachment-1")).toBe(
			"quarterly report .xlsx",
		);
	});

	it("should fall back when nothing usable is left", () => {
		expect(sanitizeFilename("", "attachment-3")).toBe("attachment-3");
		expect(sanitizeFilename("///", "attachment-3")).toBe("attachment-3");
	});

	it("should truncate long names and keep the extension", () => {
		const name = sanitizeFilename(`${"x".repeat(200)}.pdf`, "attachment-1");

		expect(name).toHaveLength(150);
		expect(name).toBe(`${"x".repeat(146)}.pdf`);
	});
});
