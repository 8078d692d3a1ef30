/**
 * Database options, validated with Zod when a Database is constructed.
 */

import {z} from "zod";

import {ConfigurationError} from "./errors.js";
import {createConsoleLogger, type Logger} from "./logger.js";

/** Poll interval of the fire-and-forget queue when it is empty */
export const DEFAULT_QUEUE_INTERVAL = 2000;

function isLogger(value: unknown): value is Logger {
	return (
		typeof value === "object" &&
		value !== null &&
		"debug" in value &&
		typeof value.debug === "function" &&
		"info" in value &&
		typeof value.info === "function" &&
		"warn" in value &&
		typeof value.warn === "function" &&
		"error" in value &&
		typeof value.error === "function"
	);
}

const optionsSchema = z.object({
	debug: z.boolean().default(false),
	logger: z
		.custom<Logger>(isLogger, "Expected a logger")
		.optional(),
	queue: z
		.object({
			interval: z.number().int().positive().default(DEFAULT_QUEUE_INTERVAL),
		})
		.default({interval: DEFAULT_QUEUE_INTERVAL}),
});

export type DatabaseOptions = z.input<typeof optionsSchema>;

export interface ResolvedOptions {
	debug: boolean;
	logger: Logger;
	queue: {interval: number};
}

/**
 * Apply defaults and validate options.
 *
 * @throws ConfigurationError listing every invalid option
 */
export function resolveOptions(options: DatabaseOptions = {}): ResolvedOptions {
	const result = optionsSchema.safeParse(options);
	if (!result.success) {
		const issues: Record<string, string[]> = {};
		for (const issue of result.error.issues) {
			const path =
				issue.path.length > 0 ? issue.path.map(String).join(".") : "_root";
			(issues[path] ??= []).push(issue.message);
		}
		throw new ConfigurationError("Invalid database options", issues);
	}

	const {debug, logger, queue} = result.data;
	return {
		debug,
		logger: logger ?? createConsoleLogger(),
		queue,
	};
}
