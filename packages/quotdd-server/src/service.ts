import { on } from "node:events";
import { createServer, Socket, type AddressInfo, type Server } from "node:net";
import type { ServiceStatus } from "@quotdd/contracts";
import type { Logger } from "pino";
import { handleConnection, peerAddress, type ConnectionHandler, type ConnectionOutcome } from "./connection.js";
import type { QuoteBook } from "./quotes.js";
import { DecayingRateLimiter, type RateLimitPolicy } from "./rate-limit.js";

export interface QuoteServiceOptions {
  host: string;
  port: number;
  quotes: QuoteBook;
  rateLimit: RateLimitPolicy;
  decayIntervalMs: number;
  connectionTimeoutMs: number;
  /** Open sockets, in flight plus queued; Node closes connections beyond this at accept. */
  maxConnections: number;
  /** Let a single connection's I/O error stop the whole service. */
  failFast: boolean;
  logger: Logger;
}

interface ServiceDeps {
  handler?: ConnectionHandler;
}

type Counters = Record<ConnectionOutcome | "failed" | "dropped" | "decays", number>;

/**
 * Owns the listening socket, the rate limiter and the decay timer. Accepted
 * connections are handled strictly one after another; the decay timer runs
 * on its own interval and may fire while a handler waits on a slow peer.
 */
export class QuoteService {
  private readonly server: Server = createServer();
  private readonly limiter: DecayingRateLimiter;
  private readonly handler: ConnectionHandler;
  private readonly abort = new AbortController();
  private readonly openSockets = new Set<Socket>();
  private readonly counters: Counters = { served: 0, rejected: 0, failed: 0, dropped: 0, decays: 0 };
  private decayTimer: NodeJS.Timeout | null = null;
  private loop: Promise<void> | null = null;

  constructor(private readonly options: QuoteServiceOptions, deps: ServiceDeps = {}) {
    this.limiter = new DecayingRateLimiter(options.rateLimit);
    this.handler = deps.handler ?? handleConnection;
    this.server.maxConnections = options.maxConnections;

    this.server.on("connection", (socket: Socket) => {
      this.openSockets.add(socket);
      const address = socket.remoteAddress;
      // Queued sockets wait behind the one being handled and can still be reset.
      socket.on("error", (error) => {
        options.logger.debug({ err: error, address }, "socket error");
      });
      socket.once("close", () => {
        this.openSockets.delete(socket);
      });
    });

    this.server.on("drop", (data) => {
      this.counters.dropped += 1;
      options.logger.warn({ address: data?.remoteAddress }, "connection dropped, too many open sockets");
    });
  }

  async listen(): Promise<AddressInfo> {
    if (this.loop) {
      throw new Error("Service already running");
    }

    const { host, port } = this.options;
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(new Error(`binding on port ${port}`, { cause: error }));
      };
      this.server.once("error", onError);
      this.server.listen(port, host, () => {
        this.server.off("error", onError);
        resolve();
      });
    });

    const address = this.address();
    if (!address) {
      throw new Error(`binding on port ${port}: no address assigned`);
    }
    this.options.logger.info(`Listening on socket ${address.address}:${address.port}`);

    this.loop = this.serve();
    this.decayTimer = setInterval(() => {
      this.decay();
    }, this.options.decayIntervalMs);

    return address;
  }

  /** Resolves once the service has been closed; rejects on a fatal error. */
  wait(): Promise<void> {
    if (!this.loop) {
      return Promise.reject(new Error("Service not started"));
    }
    return this.loop;
  }

  async close(): Promise<void> {
    if (!this.abort.signal.aborted) {
      this.abort.abort();
    }
    await this.stop();
    if (this.loop) {
      // A fatal loop error has already been reported through wait().
      await Promise.allSettled([this.loop]);
    }
  }

  address(): AddressInfo | null {
    const address = this.server.address();
    if (address === null || typeof address === "string") {
      return null;
    }
    return address;
  }

  status(): ServiceStatus {
    const address = this.address();
    return {
      listening: this.server.listening,
      address: address?.address ?? null,
      port: address?.port ?? null,
      trackedAddresses: this.limiter.trackedAddresses,
      served: this.counters.served,
      rejected: this.counters.rejected,
      failed: this.counters.failed,
      dropped: this.counters.dropped,
      decays: this.counters.decays,
      threshold: this.options.rateLimit.threshold,
      decayAmount: this.options.rateLimit.decayAmount,
      decayIntervalMs: this.options.decayIntervalMs,
    };
  }

  private async serve(): Promise<void> {
    const connections = on(this.server, "connection", { signal: this.abort.signal });
    for (;;) {
      let socket: unknown;
      try {
        const next = await connections.next();
        if (next.done) {
          return;
        }
        [socket] = next.value;
      } catch (error) {
        if (this.abort.signal.aborted) {
          return;
        }
        await this.stop();
        throw new Error("accepting connection", { cause: error });
      }

      if (!(socket instanceof Socket)) {
        continue;
      }

      try {
        await this.dispatch(socket);
      } catch (error) {
        if (this.abort.signal.aborted) {
          return;
        }
        await this.stop();
        throw error;
      }
    }
  }

  private async dispatch(socket: Socket): Promise<void> {
    const address = peerAddress(socket);
    if (address === undefined) {
      // Peer vanished before it could be looked at.
      socket.destroy();
      return;
    }

    try {
      const outcome = await this.handler(socket, address, {
        limiter: this.limiter,
        quotes: this.options.quotes,
        logger: this.options.logger,
        timeoutMs: this.options.connectionTimeoutMs,
      });
      this.counters[outcome] += 1;
      this.options.logger.debug({ address, outcome }, "connection handled");
    } catch (error) {
      this.counters.failed += 1;
      socket.destroy();
      if (this.options.failFast) {
        throw error;
      }
      this.options.logger.warn({ err: error, address }, "connection handling failed");
    }
  }

  private decay(): void {
    this.limiter.decay();
    this.counters.decays += 1;
    this.options.logger.debug({ trackedAddresses: this.limiter.trackedAddresses }, "rate limits decayed");
  }

  private async stop(): Promise<void> {
    if (this.decayTimer) {
      clearInterval(this.decayTimer);
      this.decayTimer = null;
    }
    for (const socket of this.openSockets) {
      socket.destroy();
    }
    if (this.server.listening) {
      await new Promise<void>((resolve, reject) => {
        this.server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    }
  }
}
