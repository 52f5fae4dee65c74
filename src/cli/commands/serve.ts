import { ControllerServer } from "../../controller/server";
import { registerProcessErrorHandlers } from "../../controller/process-error-handlers";
import { logger } from "../../logger";
import { formatError } from "../../session/errors";
import { loadCliContext, type CliContextOptions } from "./context";

export interface ServeCommandOptions extends CliContextOptions {
  host?: string;
  port?: string;
}

function parsePort(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    logger.error({ port: raw }, "Invalid port");
    process.exit(1);
  }
  return port;
}

export async function startServe(options: ServeCommandOptions = {}): Promise<void> {
  const port = parsePort(options.port);
  const { config, configPath, capability } = await loadCliContext(options);
  registerProcessErrorHandlers();

  const server = new ControllerServer({
    capability,
    server: {
      ...config.server,
      ...(options.host ? { host: options.host } : {}),
      ...(port !== undefined ? { port } : {}),
    },
    sessions: config.sessions,
  });
  await server.start();
  logger.info({ config: configPath, port: server.getPort() }, "pollbot controller ready");

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "Shutting down controller");
    server
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error: formatError(error) }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}
