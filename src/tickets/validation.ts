import { z } from "zod";
import { InvalidIdError, ValidationError } from "../errors.ts";
import type { TicketFields, TicketPatch } from "../store/types.ts";
import { DEFAULT_PRIORITY, DEFAULT_STATUS } from "./statuses.ts";

const text = z.string().trim();

export const createTicketSchema = z.object({
	name: text.min(1, "name is required"),
	phone: text.default(""),
	room: text.default(""),
	description: text.default(""),
	status: text.min(1).default(DEFAULT_STATUS),
	priority: text.min(1).default(DEFAULT_PRIORITY),
});

export const updateTicketSchema = z
	.object({
		name: text.min(1, "name cannot be empty"),
		phone: text,
		room: text,
		description: text,
		status: text.min(1),
		priority: text.min(1),
	})
	.partial();

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
	const result = schema.safeParse(body ?? {});
	if (!result.success) {
		throw new ValidationError(
			"Invalid ticket",
			result.error.issues.map((issue) => ({
				field: issue.path.join(".") || "body",
				message: issue.message,
			})),
		);
	}
	return result.data;
}

export function parseCreateTicket(body: unknown): TicketFields {
	return parseWith(createTicketSchema, body);
}

export function parseUpdateTicket(body: unknown): TicketPatch {
	return parseWith(updateTicketSchema, body);
}

/** Largest value of the `serial` (int4) id column. */
const MAX_TICKET_ID = 2_147_483_647;

export function parseTicketId(raw: string): number {
	if (!/^\d+$/.test(raw)) {
		throw new InvalidIdError(raw);
	}
	const id = Number(raw);
	if (!Number.isSafeInteger(id) || id <= 0 || id > MAX_TICKET_ID) {
		throw new InvalidIdError(raw);
	}
	return id;
}
