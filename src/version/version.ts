import * as E from "fp-ts/Either";
import * as F from "fp-ts/function";
import * as RA from "fp-ts/ReadonlyArray";
import * as N from "fp-ts/number";
import * as O from "fp-ts/Ord";
import * as Q from "fp-ts/Eq";
import type { Show as ShowT } from "fp-ts/Show";

import _ from "lodash";

import * as Err from "@stackless/shared/errors";
import type { Cause } from "@stackless/shared/errors";

/**
 * The version of a piece of software.
 *
 * Two versions are equal when their branches hold the same numbers in the same order
 * and they carry the same tags, in any order.
 */
export type Version = {
	readonly branch: ReadonlyArray<number>;
	readonly tags: ReadonlyArray<string>;
};

const invalidPart = (branch: ReadonlyArray<number>, tags: ReadonlyArray<string>): string | undefined => {
	if (branch.length === 0) {
		return "missing branch";
	}
	const i = branch.findIndex(n => !Number.isSafeInteger(n) || n < 0);
	if (i >= 0) {
		return `branch component ${i} "${branch[i]}" is not a non-negative integer`;
	}
	if (tags.some(t => t === "")) {
		return "empty tag";
	}
	const dashed = tags.find(t => t.includes("-"));
	if (dashed !== undefined) {
		return `tag "${dashed}" contains "-"`;
	}
	return undefined;
};

/** Accepts only parts that `parse` reads back from their `display` unchanged. */
export const create = (branch: ReadonlyArray<number>, tags: ReadonlyArray<string> = []): E.Either<Cause, Version> => {
	const reason = invalidPart(branch, tags);
	if (reason !== undefined) {
		return E.left(Err.MalformedVersion(display({ branch, tags }), reason));
	}
	return E.right(Object.freeze({ branch: Object.freeze([...branch]), tags: Object.freeze([...tags]) }));
};

/** Like `create`, but throws a `MalformedVersionError` on invalid parts. */
export const make = (branch: ReadonlyArray<number>, tags: ReadonlyArray<string> = []): Version =>
	F.pipe(
		create(branch, tags),
		E.getOrElseW(cause => {
			throw new Err.MalformedVersionError(cause);
		}),
	);

export const Eq: Q.Eq<Version> = Q.fromEquals((x, y) => _.isEqual(x.branch, y.branch) && _.isEqual(_.sortBy(x.tags), _.sortBy(y.tags)));

/** Lexicographic on the branch. Tags play no part in ordering. */
export const Ord: O.Ord<Version> = F.pipe(
	RA.getOrd(N.Ord),
	O.contramap((v: Version) => v.branch),
);

export const display = (v: Version): string => v.branch.join(".") + v.tags.map(t => `-${t}`).join("");

export const Show: ShowT<Version> = { show: display };

const component =
	(input: string) =>
	(segment: string, i: number): E.Either<Cause, number> =>
	{
		if (!/^\d+$/.test(segment)) {
			return E.left(Err.MalformedVersion(input, `branch component ${i} "${segment}" is not a number`));
		}
		const n = Number(segment);
		return Number.isSafeInteger(n) ? E.right(n) : E.left(Err.MalformedVersion(input, `branch component ${i} "${segment}" is too large`));
	};

/** Inverse of `display`: `"1.2.3-beta-rc"` has branch `[1, 2, 3]` and tags `["beta", "rc"]`. */
export const parse = (input: string): E.Either<Cause, Version> => {
	const [head, ...tags] = input.split("-");
	if (head === "") {
		return E.left(Err.MalformedVersion(input, "missing branch"));
	}
	if (tags.some(t => t === "")) {
		return E.left(Err.MalformedVersion(input, "empty tag"));
	}
	return F.pipe(
		head.split("."),
		E.traverseReadonlyArrayWithIndex((i, segment) => component(input)(segment, i)),
		E.chain(branch => create(branch, tags)),
	);
};
