import { Command } from "commander";
import chalk from "chalk";
import { getGeneratorDefaults, type GeneratorDefaults } from "../config/defaults.js";
import { buildExampleConfig } from "../services/example.js";
import { formatDiagnostic, serializeDocument } from "../output.js";
import { parseIndent } from "./options.js";

export interface ExampleOptions {
  indent?: number;
}

/**
 * Print the demonstration configuration.
 * Returns the process exit code.
 */
export function runExample(
  options: ExampleOptions,
  defaults?: GeneratorDefaults
): number {
  try {
    const resolved = defaults ?? getGeneratorDefaults();
    const result = buildExampleConfig().render();

    console.log(serializeDocument(result.document, options.indent ?? resolved.jsonIndent));
    if (!result.complete) {
      console.error(formatDiagnostic(result.diagnostic));
      return 1;
    }
    return 0;
  } catch (error) {
    console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
    return 1;
  }
}

export function registerExampleCommand(program: Command): void {
  program
    .command("example")
    .description("Print the demonstration configuration")
    .option("--indent <spaces>", "JSON indentation", parseIndent)
    .action((options: ExampleOptions) => {
      process.exitCode = runExample(options);
    });
}
