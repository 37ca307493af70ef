import { WebClient } from "@slack/web-api";
import type { KnownBlock } from "@slack/web-api";

export function createSlackClient(token: string | undefined): WebClient | null {
	return token ? new WebClient(token) : null;
}

export function buildTicketBlocks(text: string, ticketId?: number): KnownBlock[] {
	const blocks: KnownBlock[] = [
		{
			type: "section",
			text: {
				type: "mrkdwn",
				text: text,
			},
		},
	];

	// Add interactive buttons if ticket ID is provided
	if (ticketId) {
		blocks.push({
			type: "actions",
			elements: [
				{
					type: "button",
					text: {
						type: "plain_text",
						text: "🔄 Mark In Progress",
						emoji: true,
					},
					style: "primary",
					value: `in_progress_${ticketId}`,
					action_id: "ticket_in_progress",
				},
				{
					type: "button",
					text: {
						type: "plain_text",
						text: "✅ Close Ticket",
						emoji: true,
					},
					style: "danger",
					value: `close_${ticketId}`,
					action_id: "ticket_close",
				},
			],
		});
	}

	return blocks;
}

export async function postToSlackChannel(
	slack: WebClient | null,
	channel: string,
	text: string,
	ticketId?: number,
): Promise<string | null> {
	if (!slack) {
		console.warn("SLACK_BOT_TOKEN not set; skipping Slack send.");
		return null;
	}

	try {
		const result = await slack.chat.postMessage({
			channel,
			text,
			blocks: buildTicketBlocks(text, ticketId),
		});
		return result.ts || null;
	} catch (error) {
		console.error("Error posting to Slack:", error);
		return null;
	}
}
