import type { Trampoline } from "./node";
import { isTrampoline } from "./node";
import { bind, later, now } from "./combinators";
import { impossible } from "@stackless/shared/errors";

/******************
 *
 * DO NOTATION
 *
 ******************/
/** `yield*`-friendly wrapper, so a Do block gets the value typed. */
export const lift = function* <A>(t: Trampoline<A>): Generator<Trampoline<A>, A, A> {
	return yield t;
};

/**
 * Sequential syntax over `bind`:
 *
 * ```ts
 * const total = Do(function* () {
 * 	const a = yield* lift(now(1));
 * 	const b = yield* lift(later(() => now(2)));
 * 	return a + b;
 * });
 * ```
 *
 * Every yield becomes one bind, resumed by the driver, so a block that loops is as stack safe as any other chain.
 * The generator is created when the driver reaches the block, which means running the block twice runs its body twice.
 */
export function Do<R>(gen: () => Generator<Trampoline<unknown>, R, never>): Trampoline<R> {
	return later(() => {
		const it: Iterator<Trampoline<unknown>, R, unknown> = gen();

		const proceed = (input: unknown): Trampoline<R> => {
			const state = it.next(input);
			if (state.done) {
				return now(state.value);
			}
			if (!isTrampoline(state.value)) {
				return impossible("Do block yielded something that is not a computation", state.value);
			}
			return bind(state.value, proceed);
		};

		return proceed(undefined);
	});
}
