import { createServer } from "node:http";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import { WebSocketServer } from "ws";
import { createApp } from "./app.ts";
import { ADMIN_SOCKET_PATH, acceptAdminSocket } from "./realtime/admin-socket.ts";
import type { TicketHub } from "./realtime/hub.ts";
import type { TicketGateway } from "./tickets/gateway.ts";

export interface TicketServerOptions {
	gateway: TicketGateway;
	hub: TicketHub;
	staticDir?: string;
	sendTimeoutMs: number;
	/** 0 disables pings. */
	heartbeatMs: number;
}

export interface TicketServer {
	http: Server;
	listen(port: number, host?: string): Promise<AddressInfo>;
	close(): Promise<void>;
}

export function createTicketServer(options: TicketServerOptions): TicketServer {
	const { gateway, hub } = options;
	const http = createServer(createApp({ gateway, hub, staticDir: options.staticDir }));
	const wss = new WebSocketServer({ server: http, path: ADMIN_SOCKET_PATH });

	wss.on("connection", (socket) => {
		acceptAdminSocket(socket, {
			hub,
			listTickets: () => gateway.list(),
			sendTimeoutMs: options.sendTimeoutMs,
		}).catch((error: unknown) => {
			console.error("❌ Admin socket setup failed:", error);
			socket.terminate();
		});
	});

	let heartbeat: NodeJS.Timeout | undefined;
	if (options.heartbeatMs > 0) {
		heartbeat = setInterval(() => {
			const ended = hub.sweep();
			if (ended > 0) console.warn(`heartbeat ended ${ended} unresponsive admin session(s)`);
		}, options.heartbeatMs);
		heartbeat.unref();
	}

	return {
		http,

		async listen(port, host) {
			await new Promise<void>((resolve, reject) => {
				http.once("error", reject);
				http.listen(port, host, () => {
					http.off("error", reject);
					resolve();
				});
			});
			const address = http.address();
			if (!address || typeof address === "string") {
				throw new Error(`Unexpected server address: ${String(address)}`);
			}
			return address;
		},

		async close() {
			if (heartbeat) clearInterval(heartbeat);
			hub.close();
			await new Promise<void>((resolve, reject) => {
				wss.close((error) => (error ? reject(error) : resolve()));
			});
			await new Promise<void>((resolve, reject) => {
				if (!http.listening) {
					resolve();
					return;
				}
				http.close((error) => (error ? reject(error) : resolve()));
				http.closeAllConnections();
			});
		},
	};
}
