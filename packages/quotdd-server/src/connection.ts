import type { Socket } from "node:net";
import { finished } from "node:stream/promises";
import type { Logger } from "pino";
import type { QuoteBook } from "./quotes.js";
import type { DecayingRateLimiter } from "./rate-limit.js";

export type ConnectionOutcome = "served" | "rejected";

export interface ConnectionContext {
  limiter: DecayingRateLimiter;
  quotes: QuoteBook;
  logger: Logger;
  /** Idle timeout for the whole exchange; 0 disables it. */
  timeoutMs: number;
}

export type ConnectionHandler = (
  socket: Socket,
  address: string,
  context: ConnectionContext,
) => Promise<ConnectionOutcome>;

const IPV4_MAPPED = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

export function peerAddress(socket: Socket): string | undefined {
  const address = socket.remoteAddress;
  if (address === undefined) {
    return undefined;
  }
  return IPV4_MAPPED.exec(address)?.[1] ?? address;
}

function write(socket: Socket, data: string): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(data, "utf8", (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function closeGracefully(socket: Socket): Promise<void> {
  try {
    socket.end();
    await finished(socket, { readable: false });
  } catch (error) {
    throw new Error("closing connection", { cause: error });
  } finally {
    socket.destroy();
  }
}

async function respond(socket: Socket, address: string, context: ConnectionContext): Promise<ConnectionOutcome> {
  if (!context.limiter.accept(address)) {
    await closeGracefully(socket);
    return "rejected";
  }

  const quote = context.quotes.pick();
  try {
    await write(socket, `${quote}\n`);
  } catch (error) {
    socket.destroy();
    throw new Error("writing quote", { cause: error });
  }

  await closeGracefully(socket);
  return "served";
}

/**
 * Serves one accepted connection: rejected peers get a closed stream with no
 * bytes, admitted peers get one quote and a newline. The socket is closed on
 * every path.
 */
export const handleConnection: ConnectionHandler = async (socket, address, context) => {
  socket.on("error", (error) => {
    context.logger.debug({ err: error, address }, "socket error");
  });

  const idle = { expired: false };
  if (context.timeoutMs > 0) {
    socket.setTimeout(context.timeoutMs, () => {
      idle.expired = true;
      socket.destroy();
    });
  }

  try {
    return await respond(socket, address, context);
  } catch (error) {
    if (idle.expired) {
      throw new Error(`connection idle for ${context.timeoutMs}ms`, { cause: error });
    }
    throw error;
  }
};
