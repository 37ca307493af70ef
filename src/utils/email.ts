import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import type { SmtpConfig } from "../config/env.ts";
import type { Ticket } from "../store/types.ts";
import { statusLabel } from "../tickets/statuses.ts";

// Helper function to escape HTML to prevent XSS
export function escapeHtml(text: string): string {
	const map: Record<string, string> = {
		"&": "&amp;",
		"<": "&lt;",
		">": "&gt;",
		'"': "&quot;",
		"'": "&#039;",
	};
	return text.replace(/[&<>"']/g, (m) => map[m] ?? m);
}

export interface Mailer {
	transporter: Transporter;
	from: string;
}

export function createMailer(smtp: SmtpConfig): Mailer | null {
	if (!smtp.user || !smtp.pass) {
		return null;
	}

	return {
		transporter: nodemailer.createTransport({
			host: smtp.host,
			port: smtp.port,
			secure: smtp.secure,
			auth: {
				user: smtp.user,
				pass: smtp.pass,
			},
		}),
		from: smtp.from ?? smtp.user,
	};
}

export async function sendEmail(mailer: Mailer | null, to: string, subject: string, html: string) {
	if (!mailer) {
		console.warn("SMTP credentials not configured; skipping email send.");
		return;
	}

	try {
		const info = await mailer.transporter.sendMail({
			from: mailer.from,
			to,
			subject,
			html,
		});

		console.log(`✅ Email sent to ${to}: ${info.messageId}`);
		return info;
	} catch (error) {
		console.error(`❌ Error sending email to ${to}:`, error);
		throw error;
	}
}

export function getTicketCreatedEmail(ticket: Ticket) {
	return {
		subject: `Ticket #${ticket.id} Created - Room ${ticket.room || "n/a"}`,
		html: `
			<!DOCTYPE html>
			<html>
			<head>
				<style>
					body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; }
					.container { max-width: 600px; margin: 0 auto; padding: 20px; }
					.header { background-color: #4F46E5; color: white; padding: 20px; text-align: center; border-radius: 5px 5px 0 0; }
					.content { background-color: #f9fafb; padding: 20px; border: 1px solid #e5e7eb; }
					.ticket-info { background-color: white; padding: 15px; margin: 15px 0; border-radius: 5px; border-left: 4px solid #4F46E5; }
					.footer { text-align: center; padding: 20px; color: #6b7280; font-size: 12px; }
				</style>
			</head>
			<body>
				<div class="container">
					<div class="header">
						<h1>🎫 New Equipment Complaint</h1>
					</div>
					<div class="content">
						<p>A new complaint ticket has been filed.</p>
						<div class="ticket-info">
							<p><strong>Ticket ID:</strong> #${ticket.id}</p>
							<p><strong>Requester:</strong> ${escapeHtml(ticket.name)}</p>
							${ticket.phone ? `<p><strong>Phone:</strong> ${escapeHtml(ticket.phone)}</p>` : ""}
							${ticket.room ? `<p><strong>Room:</strong> ${escapeHtml(ticket.room)}</p>` : ""}
							${ticket.description ? `<p><strong>Description:</strong> ${escapeHtml(ticket.description)}</p>` : ""}
							<p><strong>Priority:</strong> ${escapeHtml(ticket.priority)}</p>
							<p><strong>Status:</strong> ${escapeHtml(statusLabel(ticket.status))}</p>
						</div>
						<p>Open the admin board to follow its progress live.</p>
					</div>
					<div class="footer">
						<p>This is an automated email from Complaint Desk</p>
					</div>
				</div>
			</body>
			</html>
		`,
	};
}
