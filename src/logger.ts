/**
 * Logger utilities for visibility-scope - Structured logging integration
 */

import type { Logger, LogLevel } from "./types.js";

const LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Anything with console-shaped level methods.
 */
export type LogSink = Pick<Console, LogLevel>;

/**
 * Console logger that prefixes every line with the scope name and drops
 * lines below its level.
 *
 * @example
 * ```typescript
 * const s = scope({ name: "profile-screen", logLevel: "warn" })
 * s.deactivate() // console.warn('[profile-screen] observer count of scope "profile-screen" dropped below zero ...')
 * ```
 */
export class ConsoleLogger implements Logger {
	private readonly prefix: string;
	private readonly threshold: number;
	private readonly sink: LogSink;

	constructor(scopeName: string, level: LogLevel = "info", sink?: LogSink) {
		this.prefix = `[${scopeName}]`;
		this.threshold = LEVELS[level];
		this.sink = sink ?? console;
	}

	debug(message: string, ...args: unknown[]): void {
		this.write("debug", message, args);
	}

	info(message: string, ...args: unknown[]): void {
		this.write("info", message, args);
	}

	warn(message: string, ...args: unknown[]): void {
		this.write("warn", message, args);
	}

	error(message: string, ...args: unknown[]): void {
		this.write("error", message, args);
	}

	private write(level: LogLevel, message: string, args: unknown[]): void {
		if (LEVELS[level] < this.threshold) return;
		this.sink[level](`${this.prefix} ${message}`, ...args);
	}
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoOpLogger implements Logger {
	debug(): void {}
	info(): void {}
	warn(): void {}
	error(): void {}
}

/**
 * Pick the logger for a scope: an explicit logger wins, then a console
 * logger at the requested level, otherwise nothing is logged.
 */
export function createLogger(
	scopeName: string,
	logger?: Logger,
	level?: LogLevel,
): Logger {
	if (logger) return logger;
	if (level) return new ConsoleLogger(scopeName, level);
	return new NoOpLogger();
}
