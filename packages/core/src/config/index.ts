/**
 * Config module exports.
 */

export {
	type LogLevel,
	type Unpack64Config,
	type ConfigOverrides,
	type LoadConfigOptions,
	LOG_LEVELS,
	DEFAULT_CONFIG,
	parseSize,
	parseLogLevel,
	findConfigFile,
	parseConfigContent,
	parseConfigFile,
	readEnvOverrides,
	mergeConfig,
	loadConfig,
} from "./settings.js";
