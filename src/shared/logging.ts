import winston from "winston";

const label = ["stackless"];

export const push = (l: string) => label.push(l);
export const pop = () => label.pop();
export const peek = () => label[label.length - 1];

const prefixed = winston.format(info => {
	const msg = `[${label.join(".")}] ${String(info.message)}`;
	info[Symbol.for("message")] = msg.replace(/\n/g, " ");
	return info;
});

const stderr = new winston.transports.Console({
	stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
	format: prefixed(),
});

export const logger = winston.createLogger({
	level: "warn",
	transports: [stderr],
});

let file: winston.transports.FileTransportInstance | undefined = undefined;

export const reconfigure = (level: string, filename?: string) => {
	logger.level = level;
	if (file) {
		logger.remove(file);
		file = undefined;
	}
	if (filename) {
		file = new winston.transports.File({
			filename,
			level,
			format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
		});
		logger.add(file);
	}
};
