import dgram from "node:dgram";
import type { CommandRequest, DeviceDescriptor, Logger } from "../util/types.js";
import { decodeReply, encodeCommand, WIZ_PORT } from "./transport.js";

export const BROADCAST_ADDRESS = "255.255.255.255";
export const DEFAULT_DISCOVERY_TIMEOUT_MS = 3500;

const DISCOVER_MSG: CommandRequest = { method: "getSystemConfig", params: {} };

/**
 * Accumulates discovery replies keyed by sender address. A later reply from
 * the same address replaces the earlier one but keeps its position.
 */
export class DiscoveryCollector {
  private byAddress = new Map<string, DeviceDescriptor>();

  accept(data: Buffer, address: string): boolean {
    const result = decodeReply(data)?.result;
    if (!result || Object.keys(result).length === 0) return false;
    this.byAddress.set(address, {
      address,
      moduleName: typeof result.moduleName === "string" ? result.moduleName : undefined,
      mac: typeof result.mac === "string" ? result.mac : undefined,
      result,
    });
    return true;
  }

  devices(): DeviceDescriptor[] {
    return Array.from(this.byAddress.values());
  }
}

export type DiscoveryOptions = {
  timeoutMs?: number;
  broadcastAddress?: string;
  port?: number;
  log?: Logger;
};

/**
 * Broadcasts getSystemConfig and collects replies for the whole window.
 * Never rejects: zero replies or a socket error yield whatever was collected.
 */
export function discover(opts: DiscoveryOptions = {}): Promise<DeviceDescriptor[]> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_DISCOVERY_TIMEOUT_MS;
  const broadcastAddress = opts.broadcastAddress ?? BROADCAST_ADDRESS;
  const port = opts.port ?? WIZ_PORT;
  const log = opts.log ?? ((m: string) => console.error(m));
  const collector = new DiscoveryCollector();

  return new Promise<DeviceDescriptor[]>((resolve) => {
    const sock = dgram.createSocket("udp4");
    let done = false;

    const finish = () => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      sock.close();
      resolve(collector.devices());
    };

    const timer = setTimeout(finish, timeoutMs);

    sock.on("error", (err) => {
      log(`Discovery socket error: ${err.message}`);
      finish();
    });

    sock.on("message", (data, rinfo) => {
      if (!collector.accept(data, rinfo.address)) {
        log(`Ignoring malformed discovery reply from ${rinfo.address}`);
      }
    });

    sock.bind(() => {
      sock.setBroadcast(true);
      sock.send(encodeCommand(DISCOVER_MSG), port, broadcastAddress, (err) => {
        if (err) {
          log(`Discovery broadcast to ${broadcastAddress} failed: ${err.message}`);
          finish();
        }
      });
    });
  });
}

export function describeDevice(d: DeviceDescriptor): string {
  return `${d.moduleName ?? "WiZ Bulb"} @ ${d.address} (${d.mac ?? ""})`;
}
