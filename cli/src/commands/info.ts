/**
 * Info command — server information and capabilities of whichever
 * notification daemon owns the bus name.
 */

import { NOTIFICATIONS_BUS_NAME, NOTIFICATIONS_INTERFACE, NOTIFICATIONS_OBJECT_PATH } from "@xnotid/server";
import { withSessionBus, type CallMethod, type MethodCall } from "./bus-client.js";

export interface ServerInfoReport {
  name: string;
  vendor: string;
  version: string;
  specVersion: string;
  capabilities: string[];
}

function notificationsCall(member: string): MethodCall {
  return {
    destination: NOTIFICATIONS_BUS_NAME,
    path: NOTIFICATIONS_OBJECT_PATH,
    iface: NOTIFICATIONS_INTERFACE,
    member,
  };
}

export async function fetchServerInfo(call: CallMethod): Promise<ServerInfoReport> {
  const [name, vendor, version, specVersion] = await call(notificationsCall("GetServerInformation"));
  const [capabilities] = await call(notificationsCall("GetCapabilities"));
  return {
    name: String(name),
    vendor: String(vendor),
    version: String(version),
    specVersion: String(specVersion),
    capabilities: Array.isArray(capabilities) ? capabilities.map(String) : [],
  };
}

export function formatInfo(report: ServerInfoReport): string[] {
  return [
    `${report.name} ${report.version} (${report.vendor})`,
    `Protocol: ${report.specVersion}`,
    `Capabilities: ${report.capabilities.join(", ")}`,
  ];
}

export async function showInfo(options: { json?: boolean }): Promise<void> {
  await withSessionBus(async (call) => {
    const report = await fetchServerInfo(call);
    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }
    for (const line of formatInfo(report)) {
      console.log(line);
    }
  });
}
