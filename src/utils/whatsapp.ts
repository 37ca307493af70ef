import twilio from "twilio";

export type WhatsAppClient = ReturnType<typeof twilio>;

export interface WhatsAppConfig {
  accountSid?: string;
  authToken?: string;
  from?: string; // e.g. 'whatsapp:+14155238886'
}

export function createWhatsAppClient(config: WhatsAppConfig): WhatsAppClient | null {
  if (!config.accountSid || !config.authToken || !config.from) return null;
  return twilio(config.accountSid, config.authToken);
}

export async function sendText(client: WhatsAppClient, from: string, to: string, text: string) {
  const toWhatsApp = to.startsWith("whatsapp:") ? to : `whatsapp:${to}`;
  await client.messages.create({
    from,
    to: toWhatsApp,
    body: text,
  });
}
