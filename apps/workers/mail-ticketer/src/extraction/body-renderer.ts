import type { ExtractedTicket, MemberRecord } from "@helpdesk/core-contracts";

const HTML_ESCAPES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
	"'": "&#39;",
};

export function escapeHtml(value: string): string {
	return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const BODY_CLOSE = /<\/body\s*>/i;
const CID_REFERENCE = /\bcid:([^"'\s)>]+)/gi;

/**
 * Point `cid:` references at the stored copies of the inline parts, which
 * sit beside the body document. Unknown ids are left as they are.
 */
export function linkInlineParts(
	html: string,
	storedNames: ReadonlyMap<string, string>,
): string {
	if (storedNames.size === 0) return html;
	return html.replace(CID_REFERENCE, (reference, id: string) => {
		const name = storedNames.get(id);
		return name ? encodeURIComponent(name).replace(/'/g, "%27") : reference;
	});
}

export function membershipBlock(
	member: MemberRecord | null,
	membershipRef?: string,
): string {
	const heading = "<hr><div><strong>Membership Information</strong></div>";
	if (!member) {
		return `${heading}<p>No record found for membership number <em>${escapeHtml(membershipRef ?? "N/A")}</em>.</p>`;
	}

	const rows: Array<[string, string | null]> = [
		["Membership No", member.member_no],
		["Title", member.title],
		["First Name", member.first_name],
		["Last Name", member.last_name],
		["Tier", member.tier],
	];
	const items = rows
		.map(
			([label, value]) =>
				`<li><strong>${label}:</strong> ${escapeHtml(value ?? "")}</li>`,
		)
		.join("");

	return `${heading}<ul>${items}</ul>`;
}

/**
 * The message body as a standalone HTML document with the requester's
 * membership details appended. `inlineParts` maps Content-ID to the stored
 * name of each inline part.
 */
export function renderBodyDocument(
	ticket: Pick<ExtractedTicket, "body" | "body_html" | "membership_ref">,
	member: MemberRecord | null,
	inlineParts: ReadonlyMap<string, string> = new Map(),
): string {
	const block = membershipBlock(member, ticket.membership_ref);

	if (ticket.body_html) {
		const html = linkInlineParts(ticket.body_html, inlineParts);
		return BODY_CLOSE.test(html)
			? html.replace(BODY_CLOSE, () => `${block}</body>`)
			: html + block;
	}

	const text = ticket.body.trim() ? ticket.body : "(No message content)";
	return `<html><body><pre>${escapeHtml(text)}</pre>${block}</body></html>`;
}
