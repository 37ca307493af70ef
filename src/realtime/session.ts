import { randomUUID } from "node:crypto";
import { SendTimeoutError, SessionClosedError } from "../errors.ts";
import type { Ticket } from "../store/types.ts";
import { encodeEvent } from "./events.ts";

/** WebSocket.OPEN */
const OPEN = 1;

/**
 * The part of a `ws` WebSocket a session drives. Inbound events are wired by
 * the caller (see admin-socket.ts).
 */
export interface SessionSocket {
	readonly readyState: number;
	send(data: string, cb: (err?: Error) => void): void;
	ping(): void;
	close(code?: number, reason?: string): void;
	terminate(): void;
}

export type SessionState = "connecting" | "active" | "closed";

export type SessionEndCause =
	| "peer_closed"
	| "transport_error"
	| "send_failed"
	| "heartbeat_timeout"
	| "snapshot_failed"
	| "shutdown";

export interface SessionOptions {
	sendTimeoutMs: number;
	id?: string;
}

type EndListener = (cause: SessionEndCause) => void;

/**
 * One admin viewer connection.
 *
 * Deltas delivered before the snapshot has gone out are held in a backlog and
 * written right after `init`, so a late joiner never sees a delta ahead of its
 * snapshot and never misses one issued while the snapshot was being read.
 */
export class SubscriberSession {
	readonly id: string;
	private readonly sendTimeoutMs: number;
	private currentState: SessionState = "connecting";
	private snapshotSent = false;
	private backlog: string[] = [];
	private alive = true;
	private seqBase = 0;
	private endListeners: EndListener[] = [];

	constructor(
		private readonly socket: SessionSocket,
		options: SessionOptions,
	) {
		this.id = options.id ?? randomUUID();
		this.sendTimeoutMs = options.sendTimeoutMs;
	}

	get state(): SessionState {
		return this.currentState;
	}

	/** Hub sequence number at the moment this session was attached. */
	get baseSeq(): number {
		return this.seqBase;
	}

	activate(baseSeq: number): void {
		if (this.currentState !== "connecting") return;
		this.currentState = "active";
		this.seqBase = baseSeq;
	}

	onEnd(listener: EndListener): void {
		if (this.currentState === "closed") return;
		this.endListeners.push(listener);
	}

	async sendSnapshot(tickets: Ticket[]): Promise<void> {
		if (this.currentState !== "active") {
			throw new SessionClosedError(this.id);
		}
		if (this.snapshotSent) return;

		const writes = [this.transmit(encodeEvent({ type: "snapshot", tickets }, this.seqBase))];
		this.snapshotSent = true;
		for (const frame of this.backlog.splice(0)) {
			writes.push(this.transmit(frame));
		}
		await Promise.all(writes);
	}

	deliver(frame: string): Promise<void> {
		if (this.currentState === "closed") {
			return Promise.reject(new SessionClosedError(this.id));
		}
		if (!this.snapshotSent) {
			this.backlog.push(frame);
			return Promise.resolve();
		}
		return this.transmit(frame);
	}

	markAlive(): void {
		this.alive = true;
	}

	/** Returns false when the session was ended for missing the previous ping. */
	heartbeat(): boolean {
		if (this.currentState === "closed") return false;
		if (!this.alive) {
			this.end("heartbeat_timeout");
			return false;
		}
		this.alive = false;
		try {
			this.socket.ping();
		} catch (error) {
			console.warn(`ws ping to session ${this.id} failed:`, error);
			this.end("transport_error");
			return false;
		}
		return true;
	}

	end(cause: SessionEndCause): void {
		if (this.currentState === "closed") return;
		this.currentState = "closed";
		this.backlog = [];

		try {
			switch (cause) {
				case "peer_closed":
					break;
				case "snapshot_failed":
					this.socket.close(1011, "snapshot unavailable");
					break;
				case "shutdown":
					this.socket.close(1001, "server shutting down");
					break;
				default:
					this.socket.terminate();
			}
		} catch (error) {
			console.warn(`closing session ${this.id} failed:`, error);
		}

		const listeners = this.endListeners;
		this.endListeners = [];
		for (const listener of listeners) {
			listener(cause);
		}
	}

	private transmit(frame: string): Promise<void> {
		if (this.socket.readyState !== OPEN) {
			return Promise.reject(new SessionClosedError(this.id));
		}

		return new Promise<void>((resolve, reject) => {
			let settled = false;
			const timer = setTimeout(() => {
				settled = true;
				reject(new SendTimeoutError(this.id, this.sendTimeoutMs));
			}, this.sendTimeoutMs);

			const finish = (err?: Error) => {
				if (settled) return;
				settled = true;
				clearTimeout(timer);
				if (err) reject(err);
				else resolve();
			};

			try {
				this.socket.send(frame, finish);
			} catch (error) {
				finish(error instanceof Error ? error : new Error(String(error)));
			}
		});
	}
}
