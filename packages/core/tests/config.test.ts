import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { DEFAULT_INTERESTING_RULES } from "../src/analysis/report.js";
import {
	findConfigFile,
	loadConfig,
	parseConfigContent,
	parseLogLevel,
	parseSize,
	readEnvOverrides,
} from "../src/config/settings.js";
import { ConfigError } from "../src/errors.js";
import { makeTempDir } from "./helpers/archives.js";

describe("parseSize", () => {
	it("accepts byte counts", () => {
		expect(parseSize(1048576)).toBe(1048576);
		expect(parseSize("10")).toBe(10);
	});

	it("accepts unit suffixes in powers of 1024", () => {
		expect(parseSize("512KB")).toBe(524288);
		expect(parseSize("100 MB")).toBe(104857600);
		expect(parseSize("1.5kb")).toBe(1536);
		expect(parseSize("2GB")).toBe(2147483648);
		expect(parseSize("64b")).toBe(64);
	});

	it("rejects values that are not positive sizes", () => {
		expect(() => parseSize("ten")).toThrow(ConfigError);
		expect(() => parseSize("ten")).toThrow('Invalid value for "max-size": "ten" is not a positive size.');
		expect(() => parseSize(0)).toThrow(ConfigError);
		expect(() => parseSize(-5)).toThrow(ConfigError);
		expect(() => parseSize(1.5)).toThrow(ConfigError);
		expect(() => parseSize("5TB")).toThrow(ConfigError);
	});
});

describe("parseLogLevel", () => {
	it("accepts known levels in any case", () => {
		expect(parseLogLevel("DEBUG")).toBe("debug");
		expect(parseLogLevel(" warn ")).toBe("warn");
	});

	it("rejects unknown levels", () => {
		expect(() => parseLogLevel("verbose")).toThrow(
			'Invalid value for "log-level": expected one of error, warn, info, debug.',
		);
	});
});

describe("parseConfigContent", () => {
	it("reads every setting", () => {
		const content = [
			"max-size: 50MB",
			"max-entries: 500",
			"max-compression-ratio: 250",
			"log-level: DEBUG",
			"interesting:",
			"  keywords: [invoice]",
			'  patterns: ["*.csv"]',
		].join("\n");

		expect(parseConfigContent(content)).toEqual({
			limits: { maxSize: 52428800, maxEntries: 500, maxCompressionRatio: 250 },
			logLevel: "debug",
			interesting: { keywords: ["invoice"], patterns: ["*.csv"] },
		});
	});

	it("returns no settings for empty content", () => {
		expect(parseConfigContent("")).toEqual({});
		expect(parseConfigContent("# nothing here\n")).toEqual({});
	});

	it("rejects unknown keys", () => {
		expect(() => parseConfigContent("max_size: 1MB", "/cfg/unpack64.yml")).toThrow(
			'Unknown configuration key "max_size".',
		);
	});

	it("names the file in errors", () => {
		try {
			parseConfigContent("max-entries: -1", "/cfg/unpack64.yml");
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(ConfigError);
			expect(error instanceof ConfigError && error.configPath).toBe("/cfg/unpack64.yml");
			expect(error instanceof ConfigError && error.message).toBe(
				'Invalid value for "max-entries": -1 is not a positive integer.',
			);
		}
	});

	it("rejects lists that are not strings", () => {
		expect(() => parseConfigContent("interesting:\n  keywords: [1, 2]")).toThrow(
			'Invalid value for "interesting.keywords": expected a list of strings.',
		);
	});

	it("rejects content that is not a mapping", () => {
		expect(() => parseConfigContent("- a\n- b")).toThrow("Configuration must be a mapping of settings.");
	});

	it("reports YAML syntax errors", () => {
		expect(() => parseConfigContent("max-size: [unclosed")).toThrow("Failed to parse configuration:");
	});
});

describe("readEnvOverrides", () => {
	it("reads UNPACK64_* variables", () => {
		expect(
			readEnvOverrides({ UNPACK64_MAX_SIZE: "1MB", UNPACK64_MAX_ENTRIES: "20", UNPACK64_LOG_LEVEL: "warn" }),
		).toEqual({ limits: { maxSize: 1048576, maxEntries: 20 }, logLevel: "warn" });
	});

	it("ignores empty values", () => {
		expect(readEnvOverrides({ UNPACK64_MAX_SIZE: "", HOME: "/home/test" })).toEqual({});
	});

	it("rejects invalid values", () => {
		expect(() => readEnvOverrides({ UNPACK64_MAX_ENTRIES: "abc" })).toThrow(
			'Invalid value for "UNPACK64_MAX_ENTRIES": "abc" is not a positive integer.',
		);
	});
});

describe("loadConfig", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = makeTempDir("config-test-");
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("uses the defaults when nothing is configured", () => {
		expect(loadConfig({ cwd: tempDir, env: {} })).toEqual({
			limits: { maxSize: 104857600, maxEntries: 10000, maxCompressionRatio: Number.POSITIVE_INFINITY },
			interesting: DEFAULT_INTERESTING_RULES,
			logLevel: "info",
		});
	});

	it("applies file, environment and overrides in order", () => {
		fs.writeFileSync(path.join(tempDir, "unpack64.yml"), "max-size: 1KB\nlog-level: warn\nmax-entries: 3\n");

		const config = loadConfig({
			cwd: tempDir,
			env: { UNPACK64_LOG_LEVEL: "error", UNPACK64_MAX_ENTRIES: "5" },
			overrides: { limits: { maxEntries: 7 } },
		});

		expect(config.limits).toEqual({ maxSize: 1024, maxEntries: 7, maxCompressionRatio: Number.POSITIVE_INFINITY });
		expect(config.logLevel).toBe("error");
		expect(config.interesting).toEqual(DEFAULT_INTERESTING_RULES);
	});

	it("finds a .yaml file", () => {
		fs.writeFileSync(path.join(tempDir, "unpack64.yaml"), "log-level: debug\n");

		expect(findConfigFile(tempDir)).toBe(path.join(tempDir, "unpack64.yaml"));
		expect(loadConfig({ cwd: tempDir, env: {} }).logLevel).toBe("debug");
	});

	it("reads an explicit path relative to the working directory", () => {
		fs.mkdirSync(path.join(tempDir, "conf"));
		fs.writeFileSync(path.join(tempDir, "conf", "custom.yml"), "interesting:\n  keywords: [invoice]\n");

		const config = loadConfig({ cwd: tempDir, configPath: "conf/custom.yml", env: {} });

		expect(config.interesting).toEqual({ keywords: ["invoice"], patterns: DEFAULT_INTERESTING_RULES.patterns });
	});

	it("fails when an explicit file is missing", () => {
		expect(() => loadConfig({ cwd: tempDir, configPath: "missing.yml", env: {} })).toThrow(
			"Failed to read configuration file:",
		);
	});
});
