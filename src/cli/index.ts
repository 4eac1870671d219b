#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { loadConfig } from "../core/config";
import { configureLogger } from "../core/logger";
import { commands as collectCommands } from "./commands/collect";
import { commands as authCommands } from "./commands/auth";
import { commands as runsCommands } from "./commands/runs";
import { commands as dbCommands } from "./commands/db";

const config = loadConfig(process.env);
configureLogger(config.log);

const program = new Command();

program.name("top-posts").description("Collect the most-liked X posts for a keyword").version("0.1.0");

collectCommands(program, config);
authCommands(program, config);
runsCommands(program, config);
dbCommands(program, config);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
