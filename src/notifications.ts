import type { WebClient } from "@slack/web-api";
import { slackChannelFor } from "./config/slackMapping.ts";
import type { SlackChannels } from "./config/slackMapping.ts";
import type { Ticket } from "./store/types.ts";
import type { TicketNotifier } from "./tickets/gateway.ts";
import { statusLabel } from "./tickets/statuses.ts";
import type { Mailer } from "./utils/email.ts";
import { getTicketCreatedEmail, sendEmail } from "./utils/email.ts";
import { postToSlackChannel } from "./utils/slack.ts";
import type { WhatsAppClient } from "./utils/whatsapp.ts";
import { sendText } from "./utils/whatsapp.ts";

export interface NotifierDeps {
	slack: WebClient | null;
	slackChannels: SlackChannels;
	mailer: Mailer | null;
	opsEmail?: string;
	whatsapp: WhatsAppClient | null;
	whatsappFrom?: string;
}

export function formatSlackTicket(ticket: Ticket): string {
	const header = "🆕 New Equipment Complaint";
	const body = [
		`*Ticket ID:* #${ticket.id}`,
		`Requester: ${ticket.name}`,
		ticket.room ? `Room: ${ticket.room}` : undefined,
		ticket.phone ? `Phone: ${ticket.phone}` : undefined,
		ticket.description ? `Description: ${ticket.description}` : undefined,
		`Priority: ${ticket.priority}`,
		`Status: ${statusLabel(ticket.status)}`,
	]
		.filter(Boolean)
		.join("\n");
	return `${header}\n${body}`;
}

export function formatStatusMessage(ticket: Ticket): string {
	const where = ticket.room ? ` for room ${ticket.room}` : "";
	return `Your complaint #${ticket.id}${where} is now: ${statusLabel(ticket.status)}.`;
}

export function createTicketNotifier(deps: NotifierDeps): TicketNotifier {
	return {
		async ticketCreated(ticket) {
			await postToSlackChannel(
				deps.slack,
				slackChannelFor(ticket.priority, deps.slackChannels),
				formatSlackTicket(ticket),
				ticket.id,
			);

			if (deps.opsEmail) {
				const email = getTicketCreatedEmail(ticket);
				await sendEmail(deps.mailer, deps.opsEmail, email.subject, email.html);
			}
		},

		async ticketStatusChanged(ticket) {
			if (!deps.whatsapp || !deps.whatsappFrom || !ticket.phone) return;
			await sendText(deps.whatsapp, deps.whatsappFrom, ticket.phone, formatStatusMessage(ticket));
		},
	};
}
