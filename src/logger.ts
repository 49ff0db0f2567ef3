export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// stderr only: stdout may carry protocol traffic.
let threshold = LOG_LEVELS.indexOf("info");

function emit(level: LogLevel, args: unknown[]): void {
	if (LOG_LEVELS.indexOf(level) < threshold) return;
	console.error(`[${level.toUpperCase()}]`, ...args);
}

export function setLogLevel(level: LogLevel): void {
	threshold = LOG_LEVELS.indexOf(level);
}

export const logger = {
	info: (...args: unknown[]) => emit("info", args),
	warn: (...args: unknown[]) => emit("warn", args),
	error: (...args: unknown[]) => emit("error", args),
	debug: (...args: unknown[]) => emit("debug", args),
};
