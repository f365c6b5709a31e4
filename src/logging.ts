import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type DestinationStream, type LevelWithSilent, type Logger } from "pino";
import { type LoggingConfig, loadSettings } from "./config/config.js";
import { resolveConfigDir } from "./config/path.js";
import { isVerbose } from "./globals.js";

const LOG_FILE_NAME = "credswitch.log";

const ALLOWED_LEVELS: readonly LevelWithSilent[] = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
];

export type LoggerSettings = {
	level?: LevelWithSilent;
	file?: string;
};

type ResolvedSettings = {
	level: LevelWithSilent;
	file: string;
};
export type LoggerResolvedSettings = ResolvedSettings;

/**
 * The subset of the pino API modules use. Secret values must never be
 * passed in either argument: log key names, paths and error kinds only.
 */
export interface ModuleLogger {
	trace(obj: object, msg?: string): void;
	debug(obj: object, msg?: string): void;
	info(obj: object, msg?: string): void;
	warn(obj: object, msg?: string): void;
	error(obj: object, msg?: string): void;
}

type LogMethod = keyof ModuleLogger;

type SonicBoomLike = DestinationStream & {
	flushSync?: () => void;
	end?: () => void;
};

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
let cachedDestination: SonicBoomLike | null = null;
let overrideSettings: LoggerSettings | null = null;
let silentFallback: Logger | null = null;
let buildError: unknown = null;

function isLevel(candidate: string): candidate is LevelWithSilent {
	return ALLOWED_LEVELS.some((level) => level === candidate);
}

function normalizeLevel(level?: string): LevelWithSilent {
	if (isVerbose()) return "debug";
	const candidate = level ?? "info";
	return isLevel(candidate) ? candidate : "info";
}

export function defaultLogFile(configDir: string = resolveConfigDir()): string {
	return path.join(configDir, "logs", LOG_FILE_NAME);
}

function resolveSettings(): ResolvedSettings {
	let cfg: LoggingConfig | undefined = overrideSettings ?? undefined;
	if (!cfg) {
		try {
			cfg = loadSettings().logging;
		} catch {
			// Invalid settings are reported by the command that loads them.
			cfg = undefined;
		}
	}
	const level = normalizeLevel(cfg?.level);
	const file = cfg?.file ?? defaultLogFile();
	return { level, file };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: SonicBoomLike): void {
	try {
		dest.flushSync?.();
	} catch {
		// best-effort
	}
	try {
		dest.end?.();
	} catch {
		// best-effort
	}
}

function buildLogger(settings: ResolvedSettings): { logger: Logger; destination: SonicBoomLike } {
	const logDir = path.dirname(settings.file);
	fs.mkdirSync(logDir, { recursive: true, mode: 0o700 });
	try {
		fs.chmodSync(logDir, 0o700);
	} catch {
		// Best effort; continue even if chmod fails (e.g., on some filesystems)
	}

	// Ensure file exists with 0600 to prevent world-readable logs.
	// O_EXCL makes the create-if-missing atomic.
	try {
		const fd = fs.openSync(
			settings.file,
			fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL,
			0o600,
		);
		fs.closeSync(fd);
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "EEXIST") {
			try {
				fs.chmodSync(settings.file, 0o600);
			} catch {
				// Ignore chmod errors; destination below will still open the file
			}
		}
		// Other errors: let pino.destination handle it
	}

	const destination: SonicBoomLike = pino.destination({
		dest: settings.file,
		mkdir: true,
		sync: true, // deterministic for tests; log volume is modest.
	});
	const logger = pino(
		{
			level: settings.level,
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
		},
		destination,
	);
	return { logger, destination };
}

function silentLogger(): Logger {
	silentFallback ??= pino({ level: "silent" });
	return silentFallback;
}

/**
 * The root logger. If the log file cannot be opened this returns a silent
 * logger and records the failure for `getLoggerError`; it does not throw.
 */
export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		if (cachedDestination) {
			closeDestination(cachedDestination);
			cachedDestination = null;
		}
		cachedSettings = settings;
		try {
			const built = buildLogger(settings);
			cachedLogger = built.logger;
			cachedDestination = built.destination;
			buildError = null;
		} catch (err) {
			cachedLogger = silentLogger();
			buildError = err;
		}
	}
	return cachedLogger;
}

/** Why the last attempt to open the log file failed, if it did. */
export function getLoggerError(): unknown {
	return buildError;
}

/**
 * Module loggers are bound at import time, before the CLI has applied
 * --config-dir and --verbose, so the pino child is resolved on each call.
 */
export function getChildLogger(bindings?: Bindings): ModuleLogger {
	let parent: Logger | null = null;
	let child: Logger | null = null;
	const current = (): Logger => {
		const root = getLogger();
		if (!child || parent !== root) {
			parent = root;
			child = root.child(bindings ?? {});
		}
		return child;
	};
	// Errors from the log destination never reach the caller.
	const emit = (level: LogMethod, obj: object, msg?: string) => {
		try {
			current()[level](obj, msg);
		} catch {
			// Dropped; the next call retries the same destination.
		}
	};
	return {
		trace: (obj, msg) => emit("trace", obj, msg),
		debug: (obj, msg) => emit("debug", obj, msg),
		info: (obj, msg) => emit("info", obj, msg),
		warn: (obj, msg) => emit("warn", obj, msg),
		error: (obj, msg) => emit("error", obj, msg),
	};
}

export function getResolvedLoggerSettings(): LoggerResolvedSettings {
	return resolveSettings();
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null) {
	closeLogger();
	overrideSettings = settings;
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
	buildError = null;
}
