import { TicketNotFoundError } from "../errors.ts";
import type { TicketBroadcaster } from "../realtime/hub.ts";
import type { Ticket, TicketFields, TicketPatch, TicketStore } from "../store/types.ts";

/** Side channels told about a mutation after it is persisted and broadcast. */
export interface TicketNotifier {
	ticketCreated(ticket: Ticket): Promise<void>;
	ticketStatusChanged(ticket: Ticket): Promise<void>;
}

export interface DeleteResult {
	id: number;
	/** False when no row existed; subscribers are still told. */
	deleted: boolean;
}

/**
 * Write path for tickets. Each mutation persists, re-reads the stored row and
 * only then broadcasts it, so subscribers always see what the database holds.
 * Broadcast and notification failures never fail the mutation, and
 * notifications run in the background so a stuck side channel cannot hold up
 * the response.
 */
export class TicketGateway {
	constructor(
		private readonly store: TicketStore,
		private readonly hub: TicketBroadcaster,
		private readonly notifier?: TicketNotifier,
	) {}

	list(): Promise<Ticket[]> {
		return this.store.listTickets();
	}

	async get(id: number): Promise<Ticket> {
		const ticket = await this.store.getTicket(id);
		if (!ticket) {
			throw new TicketNotFoundError(id);
		}
		return ticket;
	}

	async create(fields: TicketFields): Promise<Ticket> {
		const id = await this.store.createTicket(fields);

		let ticket: Ticket | null = null;
		try {
			ticket = await this.store.getTicket(id);
		} catch (error) {
			console.warn(`Re-reading created ticket #${id} failed:`, error);
		}
		if (!ticket) {
			console.warn(`Ticket #${id} created but its row could not be read back; using submitted fields`);
			ticket = { id, ...fields, createdAt: new Date(0), updatedAt: new Date(0) };
		}

		await this.hub.broadcast({ type: "created", ticket });
		void this.notify("created", ticket);
		return ticket;
	}

	async update(id: number, patch: TicketPatch): Promise<Ticket> {
		await this.store.updateTicket(id, patch);

		const ticket = await this.store.getTicket(id);
		if (!ticket) {
			throw new TicketNotFoundError(id);
		}

		await this.hub.broadcast({ type: "updated", ticket });
		if (patch.status !== undefined) {
			void this.notify("status", ticket);
		}
		return ticket;
	}

	async delete(id: number): Promise<DeleteResult> {
		const affected = await this.store.deleteTicket(id);
		await this.hub.broadcast({ type: "deleted", id });
		return { id, deleted: affected > 0 };
	}

	private async notify(kind: "created" | "status", ticket: Ticket): Promise<void> {
		if (!this.notifier) return;
		try {
			if (kind === "created") {
				await this.notifier.ticketCreated(ticket);
			} else {
				await this.notifier.ticketStatusChanged(ticket);
			}
		} catch (error) {
			// Don't fail the request if a notification fails
			console.error(`Error sending ${kind} notification for ticket #${ticket.id}:`, error);
		}
	}
}
