import { configure } from "@stackless/shared/config/options";

/**
 * Tests that need log output turn it on themselves.
 * Anything reaching the console otherwise fails the test (see console-fail-test).
 */
configure({ verbose: false, traceSteps: false, logLevel: "warn", logFile: undefined });
