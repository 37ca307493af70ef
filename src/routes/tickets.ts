import { Router } from "express";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { MethodNotAllowedError } from "../errors.ts";
import { serializeTicket } from "../realtime/events.ts";
import type { TicketGateway } from "../tickets/gateway.ts";
import { parseCreateTicket, parseTicketId, parseUpdateTicket } from "../tickets/validation.ts";

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error middleware
export function asyncHandler(handler: AsyncHandler): RequestHandler {
	return (req, res, next) => {
		handler(req, res).catch(next);
	};
}

const methodNotAllowed: RequestHandler = (req: Request, _res: Response, next: NextFunction) => {
	next(new MethodNotAllowedError(req.method));
};

export function ticketsRouter(gateway: TicketGateway): Router {
	const router = Router();

	router
		.route("/")
		.get(
			asyncHandler(async (_req, res) => {
				const tickets = await gateway.list();
				res.json(tickets.map(serializeTicket));
			}),
		)
		.post(
			asyncHandler(async (req, res) => {
				const fields = parseCreateTicket(req.body);
				const ticket = await gateway.create(fields);
				res.status(201).json(serializeTicket(ticket));
			}),
		)
		.all(methodNotAllowed);

	router
		.route("/:id")
		.get(
			asyncHandler(async (req, res) => {
				const ticket = await gateway.get(parseTicketId(req.params.id));
				res.json(serializeTicket(ticket));
			}),
		)
		.put(
			asyncHandler(async (req, res) => {
				const id = parseTicketId(req.params.id);
				const patch = parseUpdateTicket(req.body);
				const ticket = await gateway.update(id, patch);
				res.json(serializeTicket(ticket));
			}),
		)
		.delete(
			asyncHandler(async (req, res) => {
				await gateway.delete(parseTicketId(req.params.id));
				res.sendStatus(204);
			}),
		)
		.all(methodNotAllowed);

	return router;
}
