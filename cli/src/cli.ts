#!/usr/bin/env node
/**
 * xnotid CLI
 *
 * Desktop notification daemon for the freedesktop notification protocol.
 *
 * Commands:
 *   xnotid                - Run the daemon in the foreground
 *   xnotid toggle-center  - Show or hide the notification center
 *   xnotid send           - Post a notification
 *   xnotid info           - Show server information and capabilities
 *   xnotid status         - Show popups, center and do-not-disturb state
 *   xnotid dnd            - Toggle do-not-disturb
 *   xnotid clear          - Empty the notification center
 */

import { Command } from "commander";
import { readDaemonVersion } from "@xnotid/server";
import {
  runDaemon,
  toggleCenter,
  sendNotification,
  parseUrgency,
  parseActionOption,
  parseInteger,
  showInfo,
  showStatus,
  toggleDoNotDisturb,
  clearCenter,
} from "./commands/index.js";

const program = new Command();

program
  .name("xnotid")
  .description("Desktop notification daemon with popups, cards and a notification center")
  .version(readDaemonVersion());

program
  .command("start", { isDefault: true })
  .description("Run the notification daemon")
  .option("-c, --config <path>", "Config file (default: $XNOTID_CONFIG or ~/.config/xnotid/config.json)")
  .option("-v, --verbose", "Log debug output")
  .option("-q, --quiet", "Suppress log output")
  .action(runDaemon);

program
  .command("toggle-center")
  .description("Show or hide the notification center")
  .action(toggleCenter);

program
  .command("send <summary> [body]")
  .description("Post a notification and print its id")
  .option("-a, --app <name>", "Application name", "xnotid")
  .option("-u, --urgency <level>", "low, normal or critical", parseUrgency)
  .option("-t, --timeout <ms>", "Expiry in ms (-1: server default, 0: never)", parseInteger, -1)
  .option("-i, --icon <name>", "Icon name or path", "")
  .option("-A, --action <key:label>", "Add an action (repeatable)", parseActionOption, [])
  .option("-r, --replace <id>", "Replace an existing notification", parseInteger, 0)
  .option("--category <name>", "Notification category")
  .option("--transient", "Keep it out of the notification center")
  .action(sendNotification);

program
  .command("info")
  .description("Show server information and capabilities")
  .option("--json", "Output as JSON")
  .action(showInfo);

program
  .command("status")
  .description("Show popups, center and do-not-disturb state")
  .option("-c, --config <path>", "Config file used to find the renderer bridge")
  .option("--json", "Output as JSON")
  .action(showStatus);

program
  .command("dnd")
  .description("Toggle do-not-disturb")
  .option("-c, --config <path>", "Config file used to find the renderer bridge")
  .action(toggleDoNotDisturb);

program
  .command("clear")
  .description("Empty the notification center")
  .option("-c, --config <path>", "Config file used to find the renderer bridge")
  .action(clearCenter);

program.parse();
