import { match } from "ts-pattern";

/**
 * A deferred computation as a tree of nodes, after "Stackless Scala With Free Monads" (Bjarnason).
 *
 * - `Done` is a leaf holding the final value.
 * - `Suspend` is a branch whose subtree is produced by a thunk, on demand.
 * - `Bound` is an unflattened bind: reduce `sub`, then feed its value to the continuation.
 *
 * Nodes are immutable. The driver consumes them and builds new ones, it never updates them in place.
 */
export type Node<A> = Done<A> | Suspend<A> | Bound<A>;

export type Done<A> = { readonly type: "Done"; readonly value: A };
export type Suspend<A> = { readonly type: "Suspend"; readonly thunk: () => Trampoline<A> };

/**
 * The type of the sub-computation is existential: any `X` will do, as long as the continuation accepts it.
 * It is packed as a rank-2 function so the pair can only be used together.
 */
export type Bound<A> = { readonly type: "Bound"; readonly unpack: <R>(use: Unpack<A, R>) => R };
export type Unpack<A, R> = <X>(sub: Node<X>, k: Continuation<X, A>) => R;
export type Continuation<X, A> = (x: X) => Node<A>;

export type Trampoline<A> = { readonly _tag: "Trampoline"; readonly node: Node<A> };

export const Constructors = {
	Done: <A>(value: A): Node<A> => ({ type: "Done", value }),
	Suspend: <A>(thunk: () => Trampoline<A>): Node<A> => ({ type: "Suspend", thunk }),
	Bound: <X, A>(sub: Node<X>, k: Continuation<X, A>): Bound<A> => ({
		type: "Bound",
		unpack: use => use(sub, k),
	}),
};

export const wrap = <A>(node: Node<A>): Trampoline<A> => ({ _tag: "Trampoline", node });

const isNode = (u: unknown): u is Node<unknown> =>
	typeof u === "object" && u !== null && "type" in u && (u.type === "Done" || u.type === "Suspend" || u.type === "Bound");

export const isTrampoline = (u: unknown): u is Trampoline<unknown> =>
	typeof u === "object" && u !== null && "_tag" in u && u._tag === "Trampoline" && "node" in u && isNode(u.node);

/** Outermost shape of a node, for tracing. Does not force anything. */
export const display = (node: Node<unknown>): string =>
	match<Node<unknown>, string>(node)
		.with({ type: "Done" }, ({ value }) => `Done(${typeof value})`)
		.with({ type: "Suspend" }, () => "Suspend")
		.with({ type: "Bound" }, ({ unpack }) => unpack<string>(sub => `Bound(${sub.type})`))
		.exhaustive();
