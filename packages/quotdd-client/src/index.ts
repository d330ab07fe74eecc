import { connect } from "node:net";
import { ServiceStatusSchema, type ServiceStatus } from "@quotdd/contracts";

export interface FetchQuoteOptions {
  host: string;
  port: number;
  timeoutMs?: number;
}

/**
 * Opens a bare connection, sends nothing and collects everything the server
 * writes until it closes the stream. A rate-limited connection yields "".
 */
export function fetchQuote(options: FetchQuoteOptions): Promise<string> {
  const timeoutMs = options.timeoutMs ?? 5_000;

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const socket = connect({ host: options.host, port: options.port });

    socket.setTimeout(timeoutMs, () => {
      socket.destroy(new Error(`No response from ${options.host}:${options.port} within ${timeoutMs}ms`));
    });

    socket.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });

    socket.on("end", () => {
      resolve(Buffer.concat(chunks).toString("utf8"));
    });

    socket.on("error", reject);
  });
}

export async function fetchStatus(baseUrl: string): Promise<ServiceStatus> {
  const response = await fetch(new URL("/ready", baseUrl));
  const body: unknown = await response.json();
  const parsed = ServiceStatusSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error(`Unexpected status payload from ${baseUrl}: ${parsed.error.message}`);
  }
  return parsed.data;
}
