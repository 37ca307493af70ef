import express from "express";
import type { ErrorRequestHandler, Express } from "express";
import { AppError } from "./errors.ts";
import type { TicketHub } from "./realtime/hub.ts";
import { ticketsRouter } from "./routes/tickets.ts";
import type { TicketGateway } from "./tickets/gateway.ts";

export interface AppDeps {
	gateway: TicketGateway;
	hub: TicketHub;
	staticDir?: string;
}

function isJsonParseError(error: unknown): boolean {
	return error instanceof SyntaxError && "type" in error && error.type === "entity.parse.failed";
}

export const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
	if (error instanceof AppError) {
		res.status(error.statusCode).json({
			error: { code: error.code, message: error.message, details: error.details },
		});
		return;
	}
	if (isJsonParseError(error)) {
		res.status(400).json({ error: { code: "INVALID_JSON", message: "invalid json" } });
		return;
	}

	console.error("❌ Error handling request:", error);
	const message = error instanceof Error ? error.message : "internal error";
	res.status(500).json({ error: { code: "INTERNAL_ERROR", message } });
};

export function createApp(deps: AppDeps): Express {
	const app = express();
	app.use(express.json());

	app.get("/healthz", (_req, res) => {
		res.json({ status: "ok", sessions: deps.hub.size });
	});
	app.use("/api/tickets", ticketsRouter(deps.gateway));

	// serve static files (index.html, admin.html)
	if (deps.staticDir) {
		app.use(express.static(deps.staticDir));
	}

	app.use(errorHandler);
	return app;
}
