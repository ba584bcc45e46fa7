#!/usr/bin/env node
import { Command } from "commander";

import { startCommand } from "./commands/start.js";
import { initLogging } from "./log.js";

const program = new Command();

initLogging();

program.name("chatrelay").description("Telegram chat relay for Gemini").version("0.1.0");

program
    .command("start", { isDefault: true })
    .description("Run the relay until interrupted")
    .option("-e, --env <path>", "Path to a .env file to load")
    .option("-p, --port <port>", "Health endpoint port (overrides PORT)")
    .action(startCommand);

await program.parseAsync(process.argv);
