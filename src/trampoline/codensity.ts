import * as E from "fp-ts/Either";

import type { Bound, Continuation, Node, Trampoline } from "./node";
import { Constructors as C, display, wrap } from "./node";
import type { Nullable } from "@stackless/utils/Nullable";
import { impossible } from "@stackless/shared/errors";

/**
 * What a node answers when resumed: either more work (`Left`, a thunk producing the next computation)
 * or the final value (`Right`).
 */
export type Step<A> = E.Either<() => Trampoline<A>, A>;

/** O(1). Builds the bind, evaluates nothing. */
export const bind = <X, A>(sub: Node<X>, k: Continuation<X, A>): Node<A> => C.Bound(sub, k);

/**
 * `(m >>= f) >>= g` becomes `m >>= (x => f(x) >>= g)`.
 * Returns `undefined` when the sub-computation is not itself a bind, i.e. there is nothing left to rotate.
 */
export const rotate = <A>(node: Bound<A>): Nullable<Bound<A>> =>
	node.unpack<Nullable<Bound<A>>>(<X>(sub: Node<X>, k: Continuation<X, A>) => {
		if (sub.type !== "Bound") {
			return undefined;
		}
		return sub.unpack<Bound<A>>(<Y>(inner: Node<Y>, k2: Continuation<Y, X>) => C.Bound(inner, (y: Y) => C.Bound(k2(y), k)));
	});

/**
 * Rotates until the sub-computation is a `Done` or a `Suspend`.
 * Each rotation is O(1).
 */
export const reassociate = <A>(node: Bound<A>): Bound<A> => {
	let current = node;
	for (let next = rotate(current); next !== undefined; next = rotate(current)) {
		current = next;
	}
	return current;
};

export const resume = <A>(node: Node<A>): Step<A> => {
	switch (node.type) {
		case "Done":
			return E.right(node.value);
		case "Suspend":
			return E.left(node.thunk);
		case "Bound":
			return resumeBound(reassociate(node));
	}
};

/** The continuation is only ever called from inside the returned thunk. */
const resumeBound = <A>(node: Bound<A>): Step<A> =>
	node.unpack<Step<A>>(<X>(sub: Node<X>, k: Continuation<X, A>) => {
		switch (sub.type) {
			case "Done": {
				const { value } = sub;
				return E.left(() => wrap(k(value)));
			}
			case "Suspend": {
				const { thunk } = sub;
				return E.left(() => wrap(C.Bound(thunk().node, k)));
			}
			case "Bound":
				return impossible("bind was resumed before being re-associated", display(sub));
		}
	});
