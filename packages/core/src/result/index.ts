export {
	BootstrapError,
	ConfigError,
	ConversionError,
	HarnessError,
	LoadError,
	type LoadErrorDetails,
	QueryError,
	SearchEngineError,
	toError,
} from "./errors";
export { Err, Ok, type Result } from "./result";
