export type { Trampoline } from "./node";
export { isTrampoline } from "./node";
export * from "./combinators";
export { run } from "./run";
export * from "./do";
export * from "./instances";
