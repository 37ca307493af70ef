import "dotenv/config";
import { loadConfig } from "./config/env.ts";
import { createDb } from "./db/client.ts";
import { createTicketNotifier } from "./notifications.ts";
import { TicketHub } from "./realtime/hub.ts";
import { createTicketServer } from "./server.ts";
import { DrizzleTicketStore } from "./store/drizzle.ts";
import { TicketGateway } from "./tickets/gateway.ts";
import { createMailer } from "./utils/email.ts";
import { createSlackClient } from "./utils/slack.ts";
import { createWhatsAppClient } from "./utils/whatsapp.ts";

async function main() {
	const config = loadConfig();
	const { db, pool } = createDb(config.databaseUrl);

	const hub = new TicketHub({ maxSessions: config.realtime.maxSessions });
	const notifier = createTicketNotifier({
		slack: createSlackClient(config.slack.token),
		slackChannels: config.slack,
		mailer: createMailer(config.smtp),
		opsEmail: config.opsEmail,
		whatsapp: createWhatsAppClient(config.whatsapp),
		whatsappFrom: config.whatsapp.from,
	});
	const gateway = new TicketGateway(new DrizzleTicketStore(db), hub, notifier);

	const server = createTicketServer({
		gateway,
		hub,
		staticDir: config.staticDir,
		sendTimeoutMs: config.realtime.sendTimeoutMs,
		heartbeatMs: config.realtime.heartbeatMs,
	});

	const address = await server.listen(config.port, config.host);
	console.log(`🚀 Complaint desk running on ${address.address}:${address.port}`);

	let stopping = false;
	const shutdown = (signal: NodeJS.Signals) => {
		if (stopping) return;
		stopping = true;
		console.log(`${signal} received, shutting down`);
		server
			.close()
			.then(() => pool.end())
			.then(() => process.exit(0))
			.catch((error: unknown) => {
				console.error("❌ Error during shutdown:", error);
				process.exit(1);
			});
	};
	process.on("SIGINT", shutdown);
	process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
	console.error("❌ Failed to start:", error);
	process.exit(1);
});
