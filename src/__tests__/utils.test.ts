import { describe, expect, it } from "vitest";
import { slackChannelFor } from "../config/slackMapping.ts";
import { isUrgent, statusLabel } from "../tickets/statuses.ts";
import { escapeHtml, getTicketCreatedEmail } from "../utils/email.ts";
import { buildTicketBlocks } from "../utils/slack.ts";

describe("statusLabel", () => {
	it("uses known labels and title-cases the rest", () => {
		expect(statusLabel("in_progress")).toBe("In Progress");
		expect(statusLabel("waiting for parts")).toBe("Waiting For Parts");
	});
});

describe("slackChannelFor", () => {
	const channels = { channel: "#tickets", urgentChannel: "#tickets-urgent" };

	it("sends high and urgent priorities to the urgent channel", () => {
		expect(isUrgent("URGENT")).toBe(true);
		expect(slackChannelFor("high", channels)).toBe("#tickets-urgent");
		expect(slackChannelFor("low", channels)).toBe("#tickets");
	});
});

describe("buildTicketBlocks", () => {
	it("adds action buttons for a ticket", () => {
		const blocks = buildTicketBlocks("hello", 12);

		expect(blocks).toHaveLength(2);
		expect(blocks[1]).toMatchObject({
			type: "actions",
			elements: [
				{ value: "in_progress_12", action_id: "ticket_in_progress" },
				{ value: "close_12", action_id: "ticket_close" },
			],
		});
	});

	it("is a single section without a ticket id", () => {
		expect(buildTicketBlocks("hello")).toEqual([{ type: "section", text: { type: "mrkdwn", text: "hello" } }]);
	});
});

describe("ticket email", () => {
	it("escapes requester input", () => {
		expect(escapeHtml(`<b>"Tom" & 'Jerry'</b>`)).toBe("&lt;b&gt;&quot;Tom&quot; &amp; &#039;Jerry&#039;&lt;/b&gt;");

		const email = getTicketCreatedEmail({
			id: 3,
			name: "<script>",
			phone: "",
			room: "",
			description: "",
			status: "open",
			priority: "low",
			createdAt: new Date(0),
			updatedAt: new Date(0),
		});

		expect(email.subject).toBe("Ticket #3 Created - Room n/a");
		expect(email.html).toContain("<p><strong>Requester:</strong> &lt;script&gt;</p>");
		expect(email.html).not.toContain("<p><strong>Room:</strong>");
	});
});
