import dgram from "node:dgram";
import os from "node:os";
import type { Logger } from "../logging";

const PROBE_HOST = "8.8.8.8";
const PROBE_PORT = 80;
const LOOPBACK_ADDRESS = "127.0.0.1";

type InterfaceTable = NodeJS.Dict<readonly os.NetworkInterfaceInfo[]>;

/**
 * Local end of a UDP socket "connected" towards a public address. Connecting a
 * datagram socket only selects a route, so nothing is sent.
 */
export function routeOutboundAddress(logger: Logger): Promise<string | null> {
  return new Promise((resolve) => {
    const socket = dgram.createSocket("udp4");
    socket.unref();
    let settled = false;

    const settle = (address: string | null) => {
      if (settled) return;
      settled = true;
      socket.close();
      resolve(address);
    };

    socket.once("error", (err) => {
      logger.warn(`Outbound address lookup failed: ${err.message}`);
      settle(null);
    });
    socket.connect(PROBE_PORT, PROBE_HOST, () => {
      settle(socket.address().address);
    });
  });
}

export function pickInterfaceAddress(interfaces: InterfaceTable): string | null {
  for (const entries of Object.values(interfaces)) {
    const match = entries?.find((entry) => entry.family === "IPv4" && !entry.internal);
    if (match) return match.address;
  }
  return null;
}

/** Display-only: never used for binding or routing. */
export async function discoverLocalAddress(logger: Logger): Promise<string> {
  const outbound = await routeOutboundAddress(logger);
  return outbound ?? pickInterfaceAddress(os.networkInterfaces()) ?? LOOPBACK_ADDRESS;
}
