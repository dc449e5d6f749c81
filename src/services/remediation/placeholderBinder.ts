/**
 * Holds loopback listeners on remediated ports so nothing else can take
 * them over. A port already in use counts as held: something is sitting on
 * it already.
 */

import net from "net";
import { logger } from "../logger";

export type BindOutcome =
  | { state: "bound" }
  | { state: "held" }
  | { state: "in_use" }
  | { state: "failed"; reason: string };

export class PlaceholderBinder {
  private readonly servers = new Map<number, net.Server>();

  constructor(private readonly host: string = "127.0.0.1") {}

  bind(port: number): Promise<BindOutcome> {
    if (this.servers.has(port)) {
      return Promise.resolve({ state: "held" });
    }

    return new Promise((resolve) => {
      const server = net.createServer((socket) => {
        socket.destroy();
      });

      server.once("error", (err: NodeJS.ErrnoException) => {
        if (err.code === "EADDRINUSE") {
          logger.info("Port already in use, treating as held", { port });
          resolve({ state: "in_use" });
          return;
        }
        logger.warn("Could not bind placeholder listener", {
          port,
          error: err.message,
        });
        resolve({ state: "failed", reason: err.code ?? err.message });
      });

      server.listen({ host: this.host, port, exclusive: true }, () => {
        // Do not keep the process alive just for the placeholder
        server.unref();
        this.servers.set(port, server);
        logger.info("Bound placeholder listener", { port });
        resolve({ state: "bound" });
      });
    });
  }

  heldPorts(): number[] {
    return [...this.servers.keys()];
  }

  async release(port: number): Promise<boolean> {
    const server = this.servers.get(port);
    if (!server) {
      return false;
    }
    this.servers.delete(port);
    await new Promise<void>((resolve) => server.close(() => resolve()));
    return true;
  }

  async releaseAll(): Promise<void> {
    await Promise.all(this.heldPorts().map((port) => this.release(port)));
  }
}
