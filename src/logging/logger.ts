export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
	debug(msg: string, meta?: Record<string, unknown>): void;
	info(msg: string, meta?: Record<string, unknown>): void;
	warn(msg: string, meta?: Record<string, unknown>): void;
	error(msg: string, meta?: Record<string, unknown>): void;
}

export type LogSink = (line: string) => void;

const ORDER: LogLevel[] = ["debug", "info", "warn", "error", "silent"];

/** JSON-Zeilen auf stderr, damit stdout für Daten frei bleibt. */
export function createLogger(level: LogLevel = "info", sink: LogSink = (line) => console.error(line)): Logger {
	const minIdx = ORDER.indexOf(level);
	function log(lvl: Exclude<LogLevel, "silent">, msg: string, meta?: Record<string, unknown>) {
		if (ORDER.indexOf(lvl) < minIdx) return;
		const entry = { level: lvl, msg, time: new Date().toISOString(), ...(meta ?? {}) };
		sink(JSON.stringify(entry, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value)));
	}
	return {
		debug: (msg, meta) => log("debug", msg, meta),
		info: (msg, meta) => log("info", msg, meta),
		warn: (msg, meta) => log("warn", msg, meta),
		error: (msg, meta) => log("error", msg, meta)
	};
}

export const silentLogger: Logger = createLogger("silent");
