import type { BroadcastEvent } from "./events.ts";
import { encodeEvent } from "./events.ts";
import type { SubscriberSession } from "./session.ts";

export interface BroadcastResult {
	seq: number;
	delivered: number;
	evicted: number;
}

/** What the write path needs from the hub. */
export interface TicketBroadcaster {
	broadcast(event: BroadcastEvent): Promise<BroadcastResult>;
}

export interface TicketHubOptions {
	/** 0 means unlimited. */
	maxSessions?: number;
}

/**
 * Registry of live admin sessions and the single fan-out path for ticket
 * changes. The registry is only read or changed in synchronous sections, and
 * broadcasts iterate a copy, so a session ending mid fan-out is safe.
 */
export class TicketHub implements TicketBroadcaster {
	private readonly sessions = new Set<SubscriberSession>();
	private readonly maxSessions: number;
	private sequence = 0;

	constructor(options: TicketHubOptions = {}) {
		this.maxSessions = options.maxSessions ?? 0;
	}

	get size(): number {
		return this.sessions.size;
	}

	/** Sequence number of the most recent broadcast. */
	get seq(): number {
		return this.sequence;
	}

	has(session: SubscriberSession): boolean {
		return this.sessions.has(session);
	}

	attach(session: SubscriberSession): boolean {
		if (session.state !== "connecting") return false;
		if (this.maxSessions > 0 && this.sessions.size >= this.maxSessions) {
			console.warn(`admin session ${session.id} rejected: ${this.sessions.size} sessions already attached`);
			return false;
		}

		this.sessions.add(session);
		session.activate(this.sequence);
		session.onEnd((cause) => {
			this.detach(session);
			console.log(`admin session ${session.id} closed (${cause}), ${this.sessions.size} remaining`);
		});
		console.log(`admin session ${session.id} attached, ${this.sessions.size} active`);
		return true;
	}

	detach(session: SubscriberSession): void {
		this.sessions.delete(session);
	}

	/**
	 * Sends one event to every attached session. Sends start in registration
	 * order within a single synchronous pass, so every session sees events in
	 * the order they were broadcast; each send is bounded by the session's
	 * timeout and a failure evicts only that session, as soon as its own send
	 * fails. Never rejects.
	 */
	async broadcast(event: BroadcastEvent): Promise<BroadcastResult> {
		const seq = ++this.sequence;
		const targets = [...this.sessions];
		if (targets.length === 0) {
			return { seq, delivered: 0, evicted: 0 };
		}

		const frame = encodeEvent(event, seq);
		let delivered = 0;
		let evicted = 0;
		await Promise.all(
			targets.map((session) =>
				session.deliver(frame).then(
					() => {
						delivered++;
					},
					(reason: unknown) => {
						console.warn(`ws write to session ${session.id} failed, removing it:`, reason);
						session.end("send_failed");
						evicted++;
					},
				),
			),
		);

		return { seq, delivered, evicted };
	}

	/** Heartbeat pass over all sessions; returns how many were ended. */
	sweep(): number {
		let ended = 0;
		for (const session of [...this.sessions]) {
			if (!session.heartbeat()) ended++;
		}
		return ended;
	}

	close(): void {
		for (const session of [...this.sessions]) {
			session.end("shutdown");
		}
		this.sessions.clear();
	}
}
