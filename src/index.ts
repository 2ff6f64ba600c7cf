export * as T from "./trampoline";
export * as Version from "./version";
