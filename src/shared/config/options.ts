import * as Log from "@stackless/shared/logging";

export type LogLevel = "error" | "warn" | "info" | "debug" | "silly";

export type Options = {
	verbose: boolean;
	/** Log the shape of every node the driver resumes. Only takes effect at `silly` level. */
	traceSteps: boolean;
	logLevel: LogLevel;
	logFile?: string;
};

const levels: LogLevel[] = ["error", "warn", "info", "debug", "silly"];

const fromEnv = (value: string | undefined): LogLevel | undefined => levels.find(l => l === value);

export const options: Options = {
	verbose: false,
	traceSteps: false,
	logLevel: fromEnv(process.env.STACKLESS_LOG_LEVEL) ?? "warn",
	logFile: process.env.STACKLESS_LOG_FILE,
};

export const configure = (changes: Partial<Options>): Options => {
	Object.assign(options, changes);
	// verbose is a shorthand for debug output
	const level = options.verbose && levels.indexOf(options.logLevel) < levels.indexOf("debug") ? "debug" : options.logLevel;
	Log.reconfigure(level, options.logFile);
	return options;
};

configure({});
