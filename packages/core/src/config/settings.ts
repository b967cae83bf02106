/**
 * @description Configuration loading for unpack64.
 *
 * Settings come from the defaults, a YAML file, environment variables and
 * explicit overrides, in increasing order of precedence.
 *
 * @module config
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { DEFAULT_INTERESTING_RULES, type InterestingFileRules } from "../analysis/report.js";
import { DEFAULT_LIMITS } from "../archive/security.js";
import type { ExtractionLimits } from "../archive/types.js";
import { ConfigError, getErrorMessage } from "../errors.js";

/** Log levels, most severe first. */
export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Resolved configuration.
 */
export interface Unpack64Config {
	limits: ExtractionLimits;
	interesting: InterestingFileRules;
	logLevel: LogLevel;
}

/**
 * Partial configuration from a single source.
 */
export interface ConfigOverrides {
	limits?: Partial<ExtractionLimits>;
	interesting?: Partial<InterestingFileRules>;
	logLevel?: LogLevel;
}

/**
 * Default configuration.
 */
export const DEFAULT_CONFIG: Readonly<Unpack64Config> = Object.freeze({
	limits: DEFAULT_LIMITS,
	interesting: DEFAULT_INTERESTING_RULES,
	logLevel: "info",
});

/** Supported configuration file names. */
const CONFIG_FILENAMES = ["unpack64.yml", "unpack64.yaml"] as const;

/** Keys accepted in a configuration file. */
const CONFIG_KEYS = new Set(["max-size", "max-entries", "max-compression-ratio", "log-level", "interesting"]);

const SIZE_UNITS: Readonly<Record<string, number>> = {
	b: 1,
	kb: 1024,
	mb: 1024 * 1024,
	gb: 1024 * 1024 * 1024,
};

/**
 * Options for loading configuration.
 */
export interface LoadConfigOptions {
	/** Directory searched for a configuration file. Defaults to the working directory. */
	cwd?: string;
	/** Explicit configuration file; must exist. */
	configPath?: string;
	/** Environment to read. Defaults to process.env. */
	env?: NodeJS.ProcessEnv;
	/** Highest-precedence settings, such as command-line flags. */
	overrides?: ConfigOverrides;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse a size such as 1048576, "512KB" or "100 MB".
 *
 * Units are powers of 1024 and case-insensitive.
 *
 * @param value - Byte count or string with an optional unit
 * @param key - Setting name for error messages
 * @param configPath - Source file for error messages
 * @returns Size in bytes
 * @throws ConfigError if the value is not a positive size
 */
export function parseSize(value: unknown, key = "max-size", configPath?: string): number {
	if (typeof value === "number" && Number.isInteger(value) && value > 0) {
		return value;
	}

	if (typeof value === "string") {
		const match = /^\s*(\d+(?:\.\d+)?)\s*([kmg]?b)?\s*$/i.exec(value);
		if (match) {
			const bytes = Math.floor(Number(match[1]) * SIZE_UNITS[(match[2] ?? "b").toLowerCase()]);
			if (bytes > 0) {
				return bytes;
			}
		}
	}

	throw new ConfigError(`Invalid value for "${key}": ${JSON.stringify(value)} is not a positive size.`, {
		configPath,
	});
}

function parsePositiveNumber(value: unknown, key: string, integer: boolean, configPath?: string): number {
	const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
	if (typeof parsed === "number" && Number.isFinite(parsed) && parsed > 0 && (!integer || Number.isInteger(parsed))) {
		return parsed;
	}
	throw new ConfigError(
		`Invalid value for "${key}": ${JSON.stringify(value)} is not a positive ${integer ? "integer" : "number"}.`,
		{ configPath },
	);
}

/**
 * Parse a log level name.
 *
 * @throws ConfigError for unknown levels
 */
export function parseLogLevel(value: unknown, key = "log-level", configPath?: string): LogLevel {
	const level = typeof value === "string" ? value.trim().toLowerCase() : "";
	if (isLogLevel(level)) {
		return level;
	}
	throw new ConfigError(`Invalid value for "${key}": expected one of ${LOG_LEVELS.join(", ")}.`, { configPath });
}

function parseStringList(value: unknown, key: string, configPath?: string): string[] {
	if (Array.isArray(value)) {
		const items = value.filter((item): item is string => typeof item === "string");
		if (items.length === value.length) {
			return items;
		}
	}
	throw new ConfigError(`Invalid value for "${key}": expected a list of strings.`, { configPath });
}

/**
 * Find the configuration file in a directory.
 *
 * @param directory - Directory to search
 * @returns Path to the configuration file or null if not found
 */
export function findConfigFile(directory: string): string | null {
	for (const filename of CONFIG_FILENAMES) {
		const configPath = path.join(directory, filename);
		if (fs.existsSync(configPath)) {
			return configPath;
		}
	}
	return null;
}

/**
 * Parse configuration content from a YAML string.
 *
 * @param content - YAML content
 * @param sourcePath - Source path for error messages (optional)
 * @returns Settings found in the content
 * @throws ConfigError if parsing fails or a value is invalid
 */
export function parseConfigContent(content: string, sourcePath?: string): ConfigOverrides {
	let raw: unknown;
	try {
		raw = yaml.load(content);
	} catch (error) {
		throw new ConfigError(`Failed to parse configuration: ${getErrorMessage(error)}`, {
			configPath: sourcePath,
			cause: error,
		});
	}

	if (raw === undefined || raw === null) {
		return {};
	}
	if (!isRecord(raw)) {
		throw new ConfigError("Configuration must be a mapping of settings.", { configPath: sourcePath });
	}

	for (const key of Object.keys(raw)) {
		if (!CONFIG_KEYS.has(key)) {
			throw new ConfigError(`Unknown configuration key "${key}".`, { configPath: sourcePath });
		}
	}

	const overrides: ConfigOverrides = {};
	const limits: Partial<ExtractionLimits> = {};

	if (raw["max-size"] !== undefined) {
		limits.maxSize = parseSize(raw["max-size"], "max-size", sourcePath);
	}
	if (raw["max-entries"] !== undefined) {
		limits.maxEntries = parsePositiveNumber(raw["max-entries"], "max-entries", true, sourcePath);
	}
	if (raw["max-compression-ratio"] !== undefined) {
		limits.maxCompressionRatio = parsePositiveNumber(
			raw["max-compression-ratio"],
			"max-compression-ratio",
			false,
			sourcePath,
		);
	}
	if (Object.keys(limits).length > 0) {
		overrides.limits = limits;
	}

	if (raw["log-level"] !== undefined) {
		overrides.logLevel = parseLogLevel(raw["log-level"], "log-level", sourcePath);
	}

	const interesting = raw.interesting;
	if (interesting !== undefined) {
		if (!isRecord(interesting)) {
			throw new ConfigError('Invalid value for "interesting": expected keywords and patterns.', {
				configPath: sourcePath,
			});
		}
		const rules: Partial<InterestingFileRules> = {};
		if (interesting.keywords !== undefined) {
			rules.keywords = parseStringList(interesting.keywords, "interesting.keywords", sourcePath);
		}
		if (interesting.patterns !== undefined) {
			rules.patterns = parseStringList(interesting.patterns, "interesting.patterns", sourcePath);
		}
		overrides.interesting = rules;
	}

	return overrides;
}

/**
 * Parse a configuration file.
 *
 * @param configPath - Full path to the configuration file
 * @throws ConfigError if the file cannot be read or parsed
 */
export function parseConfigFile(configPath: string): ConfigOverrides {
	let content: string;
	try {
		content = fs.readFileSync(configPath, "utf-8");
	} catch (error) {
		throw new ConfigError(`Failed to read configuration file: ${getErrorMessage(error)}`, {
			configPath,
			cause: error,
		});
	}
	return parseConfigContent(content, configPath);
}

/**
 * Read settings from UNPACK64_* environment variables. Empty values are ignored.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
	const overrides: ConfigOverrides = {};
	const limits: Partial<ExtractionLimits> = {};

	if (env.UNPACK64_MAX_SIZE) {
		limits.maxSize = parseSize(env.UNPACK64_MAX_SIZE, "UNPACK64_MAX_SIZE");
	}
	if (env.UNPACK64_MAX_ENTRIES) {
		limits.maxEntries = parsePositiveNumber(env.UNPACK64_MAX_ENTRIES, "UNPACK64_MAX_ENTRIES", true);
	}
	if (Object.keys(limits).length > 0) {
		overrides.limits = limits;
	}
	if (env.UNPACK64_LOG_LEVEL) {
		overrides.logLevel = parseLogLevel(env.UNPACK64_LOG_LEVEL, "UNPACK64_LOG_LEVEL");
	}

	return overrides;
}

/**
 * Apply overrides on top of a configuration.
 */
export function mergeConfig(base: Unpack64Config, overrides: ConfigOverrides): Unpack64Config {
	return {
		limits: { ...base.limits, ...overrides.limits },
		interesting: { ...base.interesting, ...overrides.interesting },
		logLevel: overrides.logLevel ?? base.logLevel,
	};
}

/**
 * Load the configuration from every source.
 *
 * @param options - Where to look and what to override
 * @returns Resolved configuration
 * @throws ConfigError if any source holds an invalid value
 */
export function loadConfig(options: LoadConfigOptions = {}): Unpack64Config {
	const configPath = options.configPath
		? path.resolve(options.cwd ?? process.cwd(), options.configPath)
		: findConfigFile(options.cwd ?? process.cwd());

	let config: Unpack64Config = mergeConfig(DEFAULT_CONFIG, {});
	if (configPath) {
		config = mergeConfig(config, parseConfigFile(configPath));
	}
	config = mergeConfig(config, readEnvOverrides(options.env));
	return mergeConfig(config, options.overrides ?? {});
}
