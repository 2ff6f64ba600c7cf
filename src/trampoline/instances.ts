import type { Functor1 } from "fp-ts/Functor";
import type { Pointed1 } from "fp-ts/Pointed";
import type { Apply1 } from "fp-ts/Apply";
import type { Applicative1 } from "fp-ts/Applicative";
import type { Chain1 } from "fp-ts/Chain";
import type { Monad1 } from "fp-ts/Monad";
import type { ChainRec1 } from "fp-ts/ChainRec";

import type { Trampoline } from "./node";
import * as T from "./combinators";

export const URI = "Trampoline";
export type URI = typeof URI;

declare module "fp-ts/HKT" {
	interface URItoKind<A> {
		readonly [URI]: Trampoline<A>;
	}
}

export const Functor: Functor1<URI> = {
	URI,
	map: (fa, f) => T.map(fa, f),
};

export const Pointed: Pointed1<URI> = {
	URI,
	of: T.now,
};

export const Apply: Apply1<URI> = {
	...Functor,
	ap: (fab, fa) => T.ap(fab, fa),
};

export const Applicative: Applicative1<URI> = {
	...Apply,
	...Pointed,
};

export const Chain: Chain1<URI> = {
	...Apply,
	chain: (fa, f) => T.bind(fa, f),
};

export const Monad: Monad1<URI> = {
	...Applicative,
	chain: Chain.chain,
};

export const ChainRec: ChainRec1<URI> = {
	...Chain,
	chainRec: (a, f) => T.chainRec(a, f),
};
