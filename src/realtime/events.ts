import type { Ticket } from "../store/types.ts";

export type TicketEvent =
	| { type: "snapshot"; tickets: Ticket[] }
	| { type: "created"; ticket: Ticket }
	| { type: "updated"; ticket: Ticket }
	| { type: "deleted"; id: number };

/** Snapshots go straight to one session; everything else fans out. */
export type BroadcastEvent = Exclude<TicketEvent, { type: "snapshot" }>;

export type WireEventName = "init" | "ticket_created" | "ticket_updated" | "ticket_deleted";

export interface TicketPayload {
	id: number;
	name: string;
	phone: string;
	room: string;
	description: string;
	status: string;
	priority: string;
	created_at: string;
	updated_at: string;
}

export type WirePayload = TicketPayload[] | TicketPayload | { id: number };

export interface Envelope {
	event: WireEventName;
	payload: WirePayload;
	seq: number;
}

export function serializeTicket(ticket: Ticket): TicketPayload {
	return {
		id: ticket.id,
		name: ticket.name,
		phone: ticket.phone,
		room: ticket.room,
		description: ticket.description,
		status: ticket.status,
		priority: ticket.priority,
		created_at: ticket.createdAt.toISOString(),
		updated_at: ticket.updatedAt.toISOString(),
	};
}

export function toEnvelope(event: TicketEvent, seq: number): Envelope {
	switch (event.type) {
		case "snapshot":
			return { event: "init", payload: event.tickets.map(serializeTicket), seq };
		case "created":
			return { event: "ticket_created", payload: serializeTicket(event.ticket), seq };
		case "updated":
			return { event: "ticket_updated", payload: serializeTicket(event.ticket), seq };
		case "deleted":
			return { event: "ticket_deleted", payload: { id: event.id }, seq };
	}
}

export function encodeEvent(event: TicketEvent, seq: number): string {
	return JSON.stringify(toEnvelope(event, seq));
}
