import { isUrgent } from "../tickets/statuses.ts";

export interface SlackChannels {
	channel: string;
	urgentChannel: string;
}

// Urgent complaints get their own channel; everything else shares one
export function slackChannelFor(priority: string, channels: SlackChannels): string {
	return isUrgent(priority) ? channels.urgentChannel : channels.channel;
}
