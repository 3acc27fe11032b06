import dgram from "node:dgram";
import { z } from "zod";
import type { CommandRequest, Logger, WizReply } from "../util/types.js";

export const WIZ_PORT = 38899;
export const DEFAULT_REPLY_TIMEOUT_MS = 1000;

const ReplySchema = z.object({
  method: z.string().optional(),
  env: z.string().optional(),
  result: z.record(z.unknown()).optional(),
  error: z.object({ code: z.number().optional(), message: z.string().optional() }).optional(),
});

const Ipv4 = z.string().ip({ version: "v4" });

export class InvalidAddressError extends Error {
  constructor(readonly address: string) {
    super(`Invalid device address: ${JSON.stringify(address)}`);
    this.name = "InvalidAddressError";
  }
}

export function assertAddress(address: string): void {
  if (!Ipv4.safeParse(address).success) throw new InvalidAddressError(address);
}

/** Decodes one datagram; anything that is not a JSON reply object yields null. */
export function decodeReply(data: Buffer): WizReply | null {
  let raw: unknown;
  try {
    raw = JSON.parse(data.toString("utf8"));
  } catch {
    return null;
  }
  const parsed = ReplySchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function encodeCommand(command: CommandRequest): Buffer {
  return Buffer.from(JSON.stringify(command), "utf8");
}

export type SendOptions = {
  waitForReply?: boolean;
  timeoutMs?: number;
};

/** What the session needs from a transport; tests substitute their own. */
export interface PilotTransport {
  send(address: string, command: CommandRequest, opts?: SendOptions): Promise<WizReply | null>;
}

export type TransportOptions = {
  port?: number;
  dryRun?: boolean;
  log?: Logger;
};

/**
 * One-shot JSON-over-UDP client. Every call opens its own socket and closes it
 * once the datagram is out (fire-and-forget) or the reply/timeout arrives.
 */
export class UdpTransport implements PilotTransport {
  readonly port: number;
  private dryRun: boolean;
  private log: Logger;

  constructor(opts: TransportOptions = {}) {
    this.port = opts.port ?? WIZ_PORT;
    this.dryRun = opts.dryRun ?? false;
    this.log = opts.log ?? ((m) => console.error(m));
  }

  async send(address: string, command: CommandRequest, opts: SendOptions = {}): Promise<WizReply | null> {
    assertAddress(address);
    const waitForReply = opts.waitForReply ?? false;
    const timeoutMs = opts.timeoutMs ?? DEFAULT_REPLY_TIMEOUT_MS;
    const payload = encodeCommand(command);

    if (this.dryRun) {
      this.log(`[DRY-RUN] ${address}:${this.port} ${payload.toString("utf8")}`);
      return null;
    }

    return new Promise<WizReply | null>((resolve) => {
      const sock = dgram.createSocket("udp4");
      let done = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (reply: WizReply | null) => {
        if (done) return;
        done = true;
        if (timer) clearTimeout(timer);
        sock.close();
        resolve(reply);
      };

      sock.on("error", (err) => {
        this.log(`UDP error talking to ${address}: ${err.message}`);
        finish(null);
      });

      if (waitForReply) {
        sock.on("message", (data) => finish(decodeReply(data)));
        timer = setTimeout(() => finish(null), timeoutMs);
      }

      sock.send(payload, this.port, address, (err) => {
        if (err) {
          this.log(`${command.method} to ${address} failed: ${err.message}`);
          finish(null);
          return;
        }
        if (!waitForReply) finish(null);
      });
    });
  }
}
