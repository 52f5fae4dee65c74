#!/usr/bin/env node
import { Command } from "commander";
import { APP_VERSION } from "../version";

const program = new Command()
  .name("pollbot")
  .description("Run background sessions that watch a live-polling service and answer new polls")
  .version(APP_VERSION);

program
  .command("run")
  .description("Run one session in the foreground from EMAIL, PASSWORD and HOST")
  .option("-c, --config <path>", "Config file path")
  .option("--capability <path>", "Capability module (overrides capability.module)")
  .option("--env-file <path>", "Environment file to load first", ".env")
  .action(async (options) => {
    const { runForeground } = await import("./commands/run");
    process.exitCode = await runForeground(options);
  });

program
  .command("serve")
  .description("Start the HTTP controller")
  .option("-c, --config <path>", "Config file path")
  .option("--capability <path>", "Capability module (overrides capability.module)")
  .option("-H, --host <host>", "Listen host")
  .option("-p, --port <port>", "Listen port")
  .action(async (options) => {
    const { startServe } = await import("./commands/serve");
    await startServe(options);
  });

program
  .command("config")
  .description("Validate the config file")
  .option("-c, --config <path>", "Config file path")
  .action(async (options) => {
    const { validateConfig } = await import("./commands/config");
    validateConfig(options.config);
  });

program.parse();
