import { describe, expect, it } from "vitest";
import { createMember } from "../__tests__/fixtures.js";
import {
	escapeHtml,
	linkInlineParts,
	membershipBlock,
	renderBodyDocument,
} from "./body-renderer.js";

const HEADING = "<hr><div><strong>Membership Information</strong></div>";

describe("escapeHtml", () => {
	it("should escape markup characters", () => {
		expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
			"&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;",
		);
	});
});

describe("membershipBlock", () => {
	it("should list the member's details", () => {
		const block = membershipBlock(createMember({ last_name: null }));

		expect(block).toBe(
			`${HEADING}<ul>` +
				"<li><strong>Membership No:</strong> M-1001</li>" +
				"<li><strong>Title:</strong> Ms</li>" +
				"<li><strong>First Name:</strong> Alice</li>" +
				"<li><strong>Last Name:</strong> </li>" +
				"<li><strong>Tier:</strong> Gold</li>" +
				"</ul>",
		);
	});

	it("should name the unmatched membership number", () => {
		expect(membershipBlock(null, "AB12345")).toBe(
			`${HEADING}<p>No record found for membership number <em>AB12345</em>.</p>`,
		);
		expect(membershipBlock(null)).toBe(
			`${HEADING}<p>No record found for membership number <em>N/A</em>.</p>`,
		);
	});
});

describe("linkInlineParts", () => {
	it("should point cid references at the stored names", () => {
		const html = linkInlineParts(
			`<img src="cid:img1@example.com"><img src='cid:logo'>`,
			new Map([
				["img1@example.com", "error screen.png"],
				["logo", "it's.png"],
			]),
		);

		expect(html).toBe(`<img src="error%20screen.png"><img src='it%27s.png'>`);
	});

	it("should leave unknown content ids alone", () => {
		const html = `<img src="cid:missing@example.com">`;

		expect(linkInlineParts(html, new Map([["other", "other.png"]]))).toBe(html);
	});
});

describe("renderBodyDocument", () => {
	it("should link inline parts in an HTML body", () => {
		const html = renderBodyDocument(
			{ body: "See below", body_html: `<body><img src="cid:img1@example.com"></body>` },
			null,
			new Map([["img1@example.com", "error.png"]]),
		);

		expect(html).toBe(`<body><img src="error.png">${membershipBlock(null)}</body>`);
	});

	it("should wrap plain text in an escaped pre block", () => {
		const html = renderBodyDocument(
			{ body: "Hi <team> & co", membership_ref: "AB12345" },
			null,
		);

		expect(html).toBe(
			"<html><body><pre>Hi &lt;team&gt; &amp; co</pre>" +
				`${HEADING}<p>No record found for membership number <em>AB12345</em>.</p>` +
				"</body></html>",
		);
	});

	it("should use a placeholder for an empty body", () => {
		expect(renderBodyDocument({ body: "  " }, null)).toBe(
			"<html><body><pre>(No message content)</pre>" +
				`${HEADING}<p>No record found for membership number <em>N/A</em>.</p>` +
				"</body></html>",
		);
	});

	it("should insert the block before the closing body tag", () => {
		const member = createMember();
		const html = renderBodyDocument(
			{ body: "Hi", body_html: "<html><body><p>Hi</p></BODY></html>" },
			member,
		);

		expect(html).toBe(
			`<html><body><p>Hi</p>${membershipBlock(member)}</body></html>`,
		);
	});

	it("should append the block to an HTML fragment as-is", () => {
		const html = renderBodyDocument(
			{ body: "Price", body_html: "<p>Price: $& more</p>" },
			null,
		);

		expect(html).toBe(`<p>Price: $& more</p>${membershipBlock(null)}`);
	});
});
