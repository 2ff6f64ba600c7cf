import * as E from "fp-ts/Either";

import type { Node, Trampoline } from "./node";
import { display } from "./node";
import { resume } from "./codensity";

import * as Log from "@stackless/shared/logging";
import { options } from "@stackless/shared/config/options";

/**
 * Forces a computation to its value in constant stack space.
 *
 * Loops until a node resumes to a final value. A computation that keeps suspending itself never returns.
 * Anything thrown by a thunk or continuation propagates as is, and nothing after it runs.
 */
export const run = <A>(t: Trampoline<A>): A => {
	if (!Log.logger.isDebugEnabled()) {
		return drive(t.node);
	}

	Log.push("run");
	try {
		const trace = options.traceSteps && Log.logger.isSillyEnabled();
		let steps = 0;
		const value = drive(t.node, node => {
			steps++;
			if (trace) {
				Log.logger.silly(`[step ${steps}] ${display(node)}`);
			}
		});
		Log.logger.debug(`Resolved after ${steps} steps`);
		return value;
	} finally {
		Log.pop();
	}
};

const drive = <A>(node: Node<A>, onStep?: (node: Node<A>) => void): A => {
	let current = node;
	while (true) {
		onStep?.(current);
		const step = resume(current);
		if (E.isRight(step)) {
			return step.right;
		}
		current = step.left().node;
	}
};
