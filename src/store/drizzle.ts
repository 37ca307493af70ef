import { desc, eq, sql } from "drizzle-orm";
import type { Database } from "../db/client.ts";
import { tickets } from "../db/schema.ts";
import type { Ticket, TicketFields, TicketPatch, TicketStore } from "./types.ts";

export class DrizzleTicketStore implements TicketStore {
	constructor(private readonly db: Database) {}

	async listTickets(): Promise<Ticket[]> {
		return this.db.select().from(tickets).orderBy(desc(tickets.createdAt), desc(tickets.id));
	}

	async getTicket(id: number): Promise<Ticket | null> {
		const [ticket] = await this.db.select().from(tickets).where(eq(tickets.id, id)).limit(1);
		return ticket ?? null;
	}

	async createTicket(fields: TicketFields): Promise<number> {
		const [row] = await this.db.insert(tickets).values(fields).returning({ id: tickets.id });
		if (!row) {
			throw new Error("Ticket insert returned no id");
		}
		return row.id;
	}

	async updateTicket(id: number, patch: TicketPatch): Promise<number> {
		const result = await this.db
			.update(tickets)
			.set({ ...patch, updatedAt: sql`now()` })
			.where(eq(tickets.id, id));
		return result.rowCount ?? 0;
	}

	async deleteTicket(id: number): Promise<number> {
		const result = await this.db.delete(tickets).where(eq(tickets.id, id));
		return result.rowCount ?? 0;
	}
}
