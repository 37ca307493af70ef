export interface FieldIssue {
	field: string;
	message: string;
}

export class AppError extends Error {
	constructor(
		public code: string,
		message: string,
		public statusCode: number = 400,
		public details?: FieldIssue[],
	) {
		super(message);
		this.name = "AppError";
	}
}

export class NotFoundError extends AppError {
	constructor(entity: string, id?: number | string) {
		super("NOT_FOUND", id !== undefined ? `${entity} ${id} not found` : `${entity} not found`, 404);
	}
}

export class TicketNotFoundError extends NotFoundError {
	constructor(public ticketId: number) {
		super("Ticket", ticketId);
		this.name = "TicketNotFoundError";
	}
}

export class ValidationError extends AppError {
	constructor(message: string = "Validation failed", details?: FieldIssue[]) {
		super("VALIDATION_ERROR", message, 400, details);
	}
}

export class InvalidIdError extends AppError {
	constructor(raw: string) {
		super("INVALID_ID", `invalid id: ${raw}`, 400);
	}
}

export class MethodNotAllowedError extends AppError {
	constructor(method: string) {
		super("METHOD_NOT_ALLOWED", `method ${method} not allowed`, 405);
	}
}

// Subscriber-side failures. These never reach an HTTP caller.

export class SessionClosedError extends Error {
	constructor(public sessionId: string) {
		super(`session ${sessionId} is closed`);
		this.name = "SessionClosedError";
	}
}

export class SendTimeoutError extends Error {
	constructor(
		public sessionId: string,
		public timeoutMs: number,
	) {
		super(`send to session ${sessionId} timed out after ${timeoutMs}ms`);
		this.name = "SendTimeoutError";
	}
}
