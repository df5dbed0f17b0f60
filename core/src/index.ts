/**
 * @xnotid/core
 *
 * Notification engine, card protocol, hint decoding, configuration types
 * and logging shared by the daemon and the CLI.
 */

export * from "./notifications/index.js";
export * from "./cards/index.js";
export * from "./config/index.js";
export * from "./engine/index.js";
export * from "./logging/index.js";
