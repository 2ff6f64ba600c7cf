import * as E from "fp-ts/Either";
import * as F from "fp-ts/function";

import type { Trampoline } from "./node";
import { Constructors as C, wrap } from "./node";
import * as Codensity from "./codensity";

/************************************************************************************************************************
 * Constructors
 ************************************************************************************************************************/

/** Adds a leaf to the computation tree. */
export const now = <A>(a: A): Trampoline<A> => wrap(C.Done(a));
export const pure = now;

/**
 * Adds a branch to the computation tree. The thunk is not called until the driver reaches it,
 * and it is called again on every run.
 */
export const later = <A>(thunk: () => Trampoline<A>): Trampoline<A> => wrap(C.Suspend(thunk));
export const suspend = later;

/************************************************************************************************************************
 * Monad
 ************************************************************************************************************************/

export const bind = <A, B>(t: Trampoline<A>, f: (a: A) => Trampoline<B>): Trampoline<B> => wrap(Codensity.bind(t.node, (a: A) => f(a).node));

export function chain<A, B>(t: Trampoline<A>, f: (a: A) => Trampoline<B>): Trampoline<B>;
export function chain<A, B>(f: (a: A) => Trampoline<B>): (t: Trampoline<A>) => Trampoline<B>;
export function chain<A, B>(
	...args: [Trampoline<A>, (a: A) => Trampoline<B>] | [(a: A) => Trampoline<B>]
): Trampoline<B> | ((t: Trampoline<A>) => Trampoline<B>) {
	if (args.length === 1) {
		const [f] = args;
		return t => bind(t, f);
	}
	const [t, f] = args;
	return bind(t, f);
}

export const flatten = <A>(tt: Trampoline<Trampoline<A>>): Trampoline<A> => bind(tt, F.identity);

/**
 * Tail recursive loop: `f` is applied again for as long as it returns a `Left`.
 */
export const chainRec = <A, B>(a: A, f: (a: A) => Trampoline<E.Either<A, B>>): Trampoline<B> =>
	later(() => bind(f(a), e => (E.isLeft(e) ? chainRec(e.left, f) : now(e.right))));

/************************************************************************************************************************
 * Functor / Applicative
 ************************************************************************************************************************/

export function map<A, B>(t: Trampoline<A>, f: (a: A) => B): Trampoline<B>;
export function map<A, B>(f: (a: A) => B): (t: Trampoline<A>) => Trampoline<B>;
export function map<A, B>(...args: [Trampoline<A>, (a: A) => B] | [(a: A) => B]): Trampoline<B> | ((t: Trampoline<A>) => Trampoline<B>) {
	if (args.length === 1) {
		const [f] = args;
		return t => bind(t, a => now(f(a)));
	}
	const [t, f] = args;
	return bind(t, a => now(f(a)));
}

/** Replaces the value, keeping the effects. */
export const as = <A, B>(t: Trampoline<A>, b: B): Trampoline<B> => map(t, F.constant(b));

/** Runs the function's computation first, then the argument's. */
export const ap = <A, B>(tf: Trampoline<(a: A) => B>, ta: Trampoline<A>): Trampoline<B> => bind(tf, f => map(ta, f));

/** `*>`: runs both in order, keeps the second value. */
export const andThen = <A, B>(first: Trampoline<A>, second: Trampoline<B>): Trampoline<B> => bind(first, () => second);

/** `<*`: runs both in order, keeps the first value. */
export const discardThen = <A, B>(first: Trampoline<A>, second: Trampoline<B>): Trampoline<A> => bind(first, a => as(second, a));

export const liftA2 =
	<A, B, C>(f: (a: A) => (b: B) => C) =>
	(ta: Trampoline<A>) =>
	(tb: Trampoline<B>): Trampoline<C> =>
		ap(map(ta, f), tb);

export const liftA3 =
	<A, B, C, D>(f: (a: A) => (b: B) => (c: C) => D) =>
	(ta: Trampoline<A>) =>
	(tb: Trampoline<B>) =>
	(tc: Trampoline<C>): Trampoline<D> =>
		ap(ap(map(ta, f), tb), tc);

/************************************************************************************************************************
 * Traversable combinators
 ************************************************************************************************************************/

/**
 * Right fold over `bind`. Computations run in list order and their values are collected in the same order.
 * The result array is allocated per run.
 */
export const sequence = <A>(ts: ReadonlyArray<Trampoline<A>>): Trampoline<A[]> =>
	later(() => {
		const collected: A[] = [];
		return ts.reduceRight<Trampoline<A[]>>(
			(rest, t) =>
				bind(t, a => {
					collected.push(a);
					return rest;
				}),
			now(collected),
		);
	});

export const sequence_ = <A>(ts: ReadonlyArray<Trampoline<A>>): Trampoline<void> =>
	ts.reduceRight<Trampoline<void>>((rest, t) => andThen(t, rest), now(undefined));

/** `f` is only called once the driver reaches the element it is applied to. */
export const mapM = <A, B>(f: (a: A, i: number) => Trampoline<B>, xs: ReadonlyArray<A>): Trampoline<B[]> =>
	sequence(xs.map((a, i) => later(() => f(a, i))));

export const forM = <A, B>(xs: ReadonlyArray<A>, f: (a: A, i: number) => Trampoline<B>): Trampoline<B[]> => mapM(f, xs);

export const mapM_ = <A, B>(f: (a: A, i: number) => Trampoline<B>, xs: ReadonlyArray<A>): Trampoline<void> =>
	sequence_(xs.map((a, i) => later(() => f(a, i))));

export const forM_ = <A, B>(xs: ReadonlyArray<A>, f: (a: A, i: number) => Trampoline<B>): Trampoline<void> => mapM_(f, xs);

/************************************************************************************************************************
 * Foldable combinators
 ************************************************************************************************************************/
export const foldM = <A, B>(f: (acc: B, a: A, i: number) => Trampoline<B>, initial: B, xs: ReadonlyArray<A>): Trampoline<B> =>
	xs.reduce<Trampoline<B>>((acc, a, i) => bind(acc, b => f(b, a, i)), now(initial));
