export type Cause =
	| { type: "Impossible"; message: string; extra?: unknown }
	| { type: "MalformedVersion"; input: string; reason: string };

export const Impossible = (message: string, extra?: unknown): Cause => ({ type: "Impossible", message, extra });
export const MalformedVersion = (input: string, reason: string): Cause => ({ type: "MalformedVersion", input, reason });

export const display = (error: Cause): string => {
	switch (error.type) {
		case "Impossible":
			return `Impossible! ${error.message}`;
		case "MalformedVersion":
			return `Malformed Version: "${error.input}". Reason: ${error.reason}`;
	}
};

/**
 * Raised when the evaluator reaches a state that no graph built through the public API can produce.
 * Not meant to be caught.
 */
export class InvariantViolation extends Error {
	readonly name = "InvariantViolation";

	constructor(readonly reason: Cause) {
		super(display(reason));
	}
}

export const impossible = (message: string, extra?: unknown): never => {
	throw new InvariantViolation(Impossible(message, extra));
};

/** Raised by `Version.make` when the parts would not survive a display and parse. */
export class MalformedVersionError extends Error {
	readonly name = "MalformedVersionError";

	constructor(readonly reason: Cause) {
		super(display(reason));
	}
}
