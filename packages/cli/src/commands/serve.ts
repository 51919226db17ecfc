import type { Command } from "commander";

export function registerServe(program: Command): void {
  program
    .command("serve")
    .description("Start the Waypoint HTTP server")
    .option("-p, --port <port>", "Port number", process.env.WAYPOINT_PORT ?? "3280")
    .option(
      "-H, --host <host>",
      "Host interface to bind (default: 127.0.0.1)",
      process.env.WAYPOINT_HOST ?? "127.0.0.1"
    )
    .action(async (opts: { port: string; host: string }) => {
      const { startServer } = await import("@waypoint/server");
      const port = parseInt(opts.port, 10);
      startServer(port, opts.host);
    });
}
