import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { Command } from "commander";
import chalk from "chalk";
import { getGeneratorDefaults, type GeneratorDefaults } from "../config/defaults.js";
import { loadSiteFile } from "../config/site.js";
import { buildKeaConfig } from "../services/site-builder.js";
import { formatDiagnostic, formatWarning, serializeDocument } from "../output.js";
import { parseIndent } from "./options.js";

export interface GenerateOptions {
  output?: string;
  indent?: number;
  allowPartial?: boolean;
}

/**
 * Render a site file and print or write the document.
 * Returns the process exit code.
 */
export function runGenerate(
  siteFile: string,
  options: GenerateOptions,
  defaults?: GeneratorDefaults
): number {
  try {
    const resolved = defaults ?? getGeneratorDefaults();
    const site = loadSiteFile(siteFile);
    const { config, warnings } = buildKeaConfig(site, resolved);

    for (const warning of warnings) {
      console.error(formatWarning(warning));
    }

    const result = config.render();
    const text = serializeDocument(result.document, options.indent ?? resolved.jsonIndent);

    if (options.output) {
      const outputPath = resolve(options.output);
      mkdirSync(dirname(outputPath), { recursive: true });
      writeFileSync(outputPath, `${text}\n`);
      console.error(chalk.gray(`Wrote ${outputPath}`));
    } else {
      console.log(text);
    }

    if (!result.complete) {
      console.error(formatDiagnostic(result.diagnostic));
      console.error(chalk.yellow("Document is incomplete and not usable by the server"));
      return options.allowPartial ? 0 : 1;
    }
    return 0;
  } catch (error) {
    console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
    return 1;
  }
}

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate <siteFile>")
    .alias("gen")
    .description("Render a site file into a Kea DHCPv4 configuration")
    .option("-o, --output <file>", "Write the document to a file instead of stdout")
    .option("--indent <spaces>", "JSON indentation", parseIndent)
    .option("--allow-partial", "Exit successfully even if the document is incomplete")
    .action((siteFile: string, options: GenerateOptions) => {
      process.exitCode = runGenerate(siteFile, options);
    });
}
