import { z } from "zod";

const optional = z
	.string()
	.trim()
	.transform((value) => (value === "" ? undefined : value))
	.optional();

const envSchema = z.object({
	PORT: z.coerce.number().int().min(0).max(65535).default(8080),
	HOST: z.string().default("0.0.0.0"),
	DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
	STATIC_DIR: z.string().default("static"),

	WS_SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
	WS_HEARTBEAT_MS: z.coerce.number().int().min(0).default(30_000),
	WS_MAX_SESSIONS: z.coerce.number().int().min(0).default(100),

	SLACK_BOT_TOKEN: optional,
	SLACK_CHANNEL: z.string().default("#tickets"),
	SLACK_URGENT_CHANNEL: z.string().default("#tickets-urgent"),

	SMTP_HOST: z.string().default("smtp.gmail.com"),
	SMTP_PORT: z.coerce.number().int().positive().default(587),
	SMTP_SECURE: z
		.enum(["true", "false"])
		.default("false")
		.transform((value) => value === "true"),
	SMTP_USER: optional,
	SMTP_PASS: optional,
	SMTP_FROM: optional,
	OPS_EMAIL: optional,

	TWILIO_ACCOUNT_SID: optional,
	TWILIO_AUTH_TOKEN: optional,
	TWILIO_WHATSAPP_FROM: optional,
});

export interface SmtpConfig {
	host: string;
	port: number;
	secure: boolean;
	user?: string;
	pass?: string;
	from?: string;
}

export interface Config {
	port: number;
	host: string;
	databaseUrl: string;
	staticDir: string;
	realtime: {
		sendTimeoutMs: number;
		heartbeatMs: number;
		maxSessions: number;
	};
	slack: {
		token?: string;
		channel: string;
		urgentChannel: string;
	};
	smtp: SmtpConfig;
	opsEmail?: string;
	whatsapp: {
		accountSid?: string;
		authToken?: string;
		from?: string;
	};
}

export class ConfigError extends Error {
	constructor(public issues: string[]) {
		super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
		this.name = "ConfigError";
	}
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
	const parsed = envSchema.safeParse(source);
	if (!parsed.success) {
		throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
	}
	const env = parsed.data;

	return {
		port: env.PORT,
		host: env.HOST,
		databaseUrl: env.DATABASE_URL,
		staticDir: env.STATIC_DIR,
		realtime: {
			sendTimeoutMs: env.WS_SEND_TIMEOUT_MS,
			heartbeatMs: env.WS_HEARTBEAT_MS,
			maxSessions: env.WS_MAX_SESSIONS,
		},
		slack: {
			token: env.SLACK_BOT_TOKEN,
			channel: env.SLACK_CHANNEL,
			urgentChannel: env.SLACK_URGENT_CHANNEL,
		},
		smtp: {
			host: env.SMTP_HOST,
			port: env.SMTP_PORT,
			secure: env.SMTP_SECURE,
			user: env.SMTP_USER,
			pass: env.SMTP_PASS,
			from: env.SMTP_FROM,
		},
		opsEmail: env.OPS_EMAIL,
		whatsapp: {
			accountSid: env.TWILIO_ACCOUNT_SID,
			authToken: env.TWILIO_AUTH_TOKEN,
			from: env.TWILIO_WHATSAPP_FROM,
		},
	};
}
