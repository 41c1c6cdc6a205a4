#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { registerExampleCommand } from "./commands/example.js";
import { registerGenerateCommand } from "./commands/generate.js";
import { registerCheckCommand } from "./commands/check.js";

const program = new Command();

program
  .name("kea-confgen")
  .description("Generate Kea DHCPv4 configuration documents")
  .version("0.1.0");

registerExampleCommand(program);
registerGenerateCommand(program);
registerCheckCommand(program);

// Error handling
program.exitOverride((err) => {
  if (err.code === "commander.helpDisplayed" || err.code === "commander.version") {
    process.exit(0);
  }
  process.exit(1);
});

program.parse();
