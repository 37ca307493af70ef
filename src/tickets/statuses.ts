export const DEFAULT_STATUS = "open";
export const DEFAULT_PRIORITY = "medium";

/** Priorities that go to the urgent Slack channel. */
export const URGENT_PRIORITIES = ["high", "urgent"];

const STATUS_LABELS: Record<string, string> = {
	open: "Open",
	in_progress: "In Progress",
	resolved: "Resolved",
	closed: "Closed",
};

// Statuses are open-ended; unknown ones are shown as "on_hold" -> "On Hold".
export function statusLabel(status: string): string {
	const known = STATUS_LABELS[status];
	if (known) return known;
	return status
		.split(/[_\s]+/)
		.filter(Boolean)
		.map((word) => word.charAt(0).toUpperCase() + word.slice(1))
		.join(" ");
}

export function isUrgent(priority: string): boolean {
	return URGENT_PRIORITIES.includes(priority.toLowerCase());
}
