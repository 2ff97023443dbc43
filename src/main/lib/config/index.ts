export {
	type ColorPalette,
	ConfigurationError,
	type ConfigurationOverrides,
	DEFAULT_CONFIGURATION,
	type FontConfiguration,
	type GlobalConfiguration,
	loadConfiguration,
	mergeConfiguration,
	readConfigFile,
} from "./configuration";
export {
	defaultWindowConfiguration,
	deriveWindowConfiguration,
	parseTool,
	type WindowConfiguration,
	windowConfigurationFromGlobals,
} from "./window-config";
