import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import WebSocket from "ws";
import type { Envelope } from "../realtime/events.ts";
import { TicketHub } from "../realtime/hub.ts";
import { createTicketServer } from "../server.ts";
import type { TicketServer } from "../server.ts";
import { TicketGateway } from "../tickets/gateway.ts";
import { MemoryTicketStore } from "./helpers/memory-store.ts";

interface AdminClient {
	socket: WebSocket;
	next(): Promise<Envelope>;
	closed: Promise<{ code: number; reason: string }>;
}

function connectAdmin(url: string): Promise<AdminClient> {
	const socket = new WebSocket(url);
	const inbox: Envelope[] = [];
	const waiters: Array<(envelope: Envelope) => void> = [];

	socket.on("message", (data) => {
		const envelope: Envelope = JSON.parse(data.toString());
		const waiter = waiters.shift();
		if (waiter) waiter(envelope);
		else inbox.push(envelope);
	});

	const closed = new Promise<{ code: number; reason: string }>((resolve) => {
		socket.once("close", (code, reason) => resolve({ code, reason: reason.toString() }));
	});

	const next = () =>
		new Promise<Envelope>((resolve) => {
			const envelope = inbox.shift();
			if (envelope) resolve(envelope);
			else waiters.push(resolve);
		});

	return new Promise((resolve, reject) => {
		socket.once("open", () => resolve({ socket, next, closed }));
		socket.once("error", reject);
	});
}

const complaint = {
	name: "A",
	phone: "1",
	room: "101",
	description: "x",
	status: "open",
	priority: "low",
};

let server: TicketServer;
let baseUrl: string;
let wsUrl: string;
let clients: AdminClient[];

async function start(maxSessions = 0) {
	const hub = new TicketHub({ maxSessions });
	const gateway = new TicketGateway(new MemoryTicketStore(Date.UTC(2026, 0, 1)), hub);
	server = createTicketServer({ gateway, hub, sendTimeoutMs: 5000, heartbeatMs: 0 });
	const address = await server.listen(0, "127.0.0.1");
	baseUrl = `http://127.0.0.1:${address.port}`;
	wsUrl = `ws://127.0.0.1:${address.port}/ws/admin`;
}

async function admin(): Promise<AdminClient> {
	const client = await connectAdmin(wsUrl);
	clients.push(client);
	return client;
}

function send(method: string, path: string, body?: unknown) {
	return fetch(`${baseUrl}${path}`, {
		method,
		headers: body === undefined ? undefined : { "Content-Type": "application/json" },
		body: body === undefined ? undefined : JSON.stringify(body),
	});
}

beforeEach(() => {
	clients = [];
	vi.spyOn(console, "log").mockImplementation(() => {});
	vi.spyOn(console, "warn").mockImplementation(() => {});
	vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
	for (const client of clients) client.socket.terminate();
	await server.close();
	vi.restoreAllMocks();
});

describe("ticket API", () => {
	beforeEach(async () => {
		await start();
	});

	it("creates a ticket and pushes it to attached admins", async () => {
		const board = await admin();
		await expect(board.next()).resolves.toEqual({ event: "init", payload: [], seq: 0 });

		const res = await send("POST", "/api/tickets", complaint);
		const body = await res.json();

		expect(res.status).toBe(201);
		expect(body).toEqual({
			id: 1,
			...complaint,
			created_at: "2026-01-01T00:00:00.000Z",
			updated_at: "2026-01-01T00:00:00.000Z",
		});
		await expect(board.next()).resolves.toEqual({ event: "ticket_created", payload: body, seq: 1 });
	});

	it("serves reads and updates", async () => {
		await send("POST", "/api/tickets", complaint);
		await send("POST", "/api/tickets", { ...complaint, name: "B" });

		const list = await (await send("GET", "/api/tickets")).json();
		expect(list).toMatchObject([{ id: 2, name: "B" }, { id: 1, name: "A" }]);

		const updated = await send("PUT", "/api/tickets/1", { status: "closed" });
		expect(updated.status).toBe(200);
		await expect(updated.json()).resolves.toMatchObject({ id: 1, status: "closed", updated_at: "2026-01-01T00:00:02.000Z" });

		const fetched = await send("GET", "/api/tickets/1");
		await expect(fetched.json()).resolves.toMatchObject({ id: 1, status: "closed" });
	});

	it("sends a late joiner the current tickets", async () => {
		await send("POST", "/api/tickets", complaint);
		const list = await (await send("GET", "/api/tickets")).json();

		const board = await admin();

		await expect(board.next()).resolves.toEqual({ event: "init", payload: list, seq: 1 });
		const health = await (await send("GET", "/healthz")).json();
		expect(health).toEqual({ status: "ok", sessions: 1 });
	});

	it("answers 404 for a missing ticket and broadcasts nothing for it", async () => {
		const board = await admin();
		await board.next();

		const missing = await send("PUT", "/api/tickets/9", { status: "closed" });
		expect(missing.status).toBe(404);
		await expect(missing.json()).resolves.toEqual({ error: { code: "NOT_FOUND", message: "Ticket 9 not found" } });

		const removed = await send("DELETE", "/api/tickets/77");
		expect(removed.status).toBe(204);
		await expect(board.next()).resolves.toEqual({ event: "ticket_deleted", payload: { id: 77 }, seq: 1 });
	});

	it("rejects bad input", async () => {
		const badId = await send("GET", "/api/tickets/abc");
		expect(badId.status).toBe(400);
		await expect(badId.json()).resolves.toEqual({ error: { code: "INVALID_ID", message: "invalid id: abc" } });

		const badJson = await fetch(`${baseUrl}/api/tickets`, {
			method: "POST",
			headers: { "Content-Type": "application/json" },
			body: "{not json",
		});
		expect(badJson.status).toBe(400);
		await expect(badJson.json()).resolves.toEqual({ error: { code: "INVALID_JSON", message: "invalid json" } });

		const invalid = await send("POST", "/api/tickets", { phone: "1" });
		expect(invalid.status).toBe(400);
		await expect(invalid.json()).resolves.toEqual({
			error: {
				code: "VALIDATION_ERROR",
				message: "Invalid ticket",
				details: [{ field: "name", message: "Required" }],
			},
		});

		const patch = await send("PATCH", "/api/tickets/1", { status: "closed" });
		expect(patch.status).toBe(405);
	});

	it("keeps notifying live admins when another one has dropped", async () => {
		await send("POST", "/api/tickets", complaint);
		const alive = await admin();
		const dead = await admin();
		await alive.next();
		await dead.next();

		dead.socket.terminate();
		await dead.closed;

		const res = await send("DELETE", "/api/tickets/1");
		expect(res.status).toBe(204);
		await expect(alive.next()).resolves.toEqual({ event: "ticket_deleted", payload: { id: 1 }, seq: 2 });
	});
});

describe("admin socket limits", () => {
	it("closes connections beyond the session cap with 1013", async () => {
		await start(1);
		const first = await admin();
		await first.next();

		const second = await admin();

		await expect(second.closed).resolves.toEqual({ code: 1013, reason: "too many admin sessions" });
	});
});
