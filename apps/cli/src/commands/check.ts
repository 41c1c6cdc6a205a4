import { Command } from "commander";
import chalk from "chalk";
import { getGeneratorDefaults, type GeneratorDefaults } from "../config/defaults.js";
import { loadSiteFile } from "../config/site.js";
import { buildKeaConfig } from "../services/site-builder.js";
import { formatDiagnostic, formatWarning } from "../output.js";

/**
 * Print every structural problem in a site file.
 * Returns the process exit code.
 */
export function runCheck(
  siteFile: string,
  defaults?: GeneratorDefaults
): number {
  try {
    const resolved = defaults ?? getGeneratorDefaults();
    const site = loadSiteFile(siteFile);
    const { config, warnings } = buildKeaConfig(site, resolved);

    for (const warning of warnings) {
      console.error(formatWarning(warning));
    }

    const problems = config.dhcp4.validate();
    if (problems.length === 0) {
      console.log(chalk.green(`✓ ${siteFile} renders a complete configuration`));
      return 0;
    }

    for (const problem of problems) {
      console.error(formatDiagnostic(problem));
    }
    return 1;
  } catch (error) {
    console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
    return 1;
  }
}

export function registerCheckCommand(program: Command): void {
  program
    .command("check <siteFile>")
    .description("List every problem that would keep a site file from rendering")
    .action((siteFile: string) => {
      process.exitCode = runCheck(siteFile);
    });
}
