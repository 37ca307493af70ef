import type { WebSocket } from "ws";
import type { Ticket } from "../store/types.ts";
import type { TicketHub } from "./hub.ts";
import { SubscriberSession } from "./session.ts";

export const ADMIN_SOCKET_PATH = "/ws/admin";

export interface AdminSocketDeps {
	hub: TicketHub;
	listTickets: () => Promise<Ticket[]>;
	sendTimeoutMs: number;
}

/**
 * Takes a freshly upgraded admin socket through attach and snapshot. The
 * channel is receive-inert: inbound frames only count as liveness.
 */
export async function acceptAdminSocket(socket: WebSocket, deps: AdminSocketDeps): Promise<SubscriberSession> {
	const session = new SubscriberSession(socket, { sendTimeoutMs: deps.sendTimeoutMs });

	socket.on("message", () => session.markAlive());
	socket.on("pong", () => session.markAlive());
	socket.on("close", () => session.end("peer_closed"));
	socket.on("error", (error) => {
		console.warn(`ws error on session ${session.id}:`, error);
		session.end("transport_error");
	});

	if (!deps.hub.attach(session)) {
		session.end("peer_closed");
		socket.close(1013, "too many admin sessions");
		return session;
	}

	try {
		const tickets = await deps.listTickets();
		await session.sendSnapshot(tickets);
	} catch (error) {
		if (session.state !== "closed") {
			console.error(`❌ Could not send snapshot to session ${session.id}:`, error);
			session.end("snapshot_failed");
		}
	}

	return session;
}
