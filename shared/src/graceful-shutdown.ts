import type { Server } from "node:http";

/**
 * Stops accepting connections on SIGTERM/SIGINT, runs the closers in order,
 * then exits. A stuck shutdown is forced after timeoutMs.
 */
export function gracefulShutdown(
  server: Server,
  closers: ReadonlyArray<() => Promise<void> | void> = [],
  timeoutMs = 5000
): void {
  let shuttingDown = false;

  const handler = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    // eslint-disable-next-line no-console
    console.log(`\n${signal} received, shutting down gracefully...`);

    setTimeout(() => {
      // eslint-disable-next-line no-console
      console.error("Forcing shutdown after timeout.");
      process.exit(1);
    }, timeoutMs).unref();

    server.close(async () => {
      // eslint-disable-next-line no-console
      console.log("Server closed.");
      try {
        for (const close of closers) await close();
        process.exit(0);
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error("Shutdown step failed:", err);
        process.exit(1);
      }
    });
  };

  process.on("SIGTERM", () => handler("SIGTERM"));
  process.on("SIGINT", () => handler("SIGINT"));
}
