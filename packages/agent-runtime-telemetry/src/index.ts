/**
 * Agent Runtime Telemetry
 *
 * Logging shared by the runtime packages.
 */

export * from "./logging";
