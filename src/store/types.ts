import type { tickets } from "../db/schema.ts";

export type Ticket = typeof tickets.$inferSelect;

/** Writable ticket fields; identity and timestamps belong to the store. */
export type TicketFields = Pick<Ticket, "name" | "phone" | "room" | "description" | "status" | "priority">;

export type TicketPatch = Partial<TicketFields>;

/**
 * Durable ticket storage. Every method must be safe to call from concurrent
 * requests; implementations rely on the database for isolation.
 */
export interface TicketStore {
	/** All tickets, newest `createdAt` first. */
	listTickets(): Promise<Ticket[]>;
	getTicket(id: number): Promise<Ticket | null>;
	/** Returns the generated id. */
	createTicket(fields: TicketFields): Promise<number>;
	/** Returns the number of rows affected; the store bumps `updatedAt`. */
	updateTicket(id: number, patch: TicketPatch): Promise<number>;
	/** Returns the number of rows affected. */
	deleteTicket(id: number): Promise<number>;
}
