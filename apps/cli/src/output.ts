import chalk from "chalk";
import type { KeaDocument, RenderDiagnostic } from "@kea-confgen/shared";

export function serializeDocument(document: KeaDocument, indent: number): string {
  return JSON.stringify(document, null, indent);
}

export function formatDiagnostic(diagnostic: RenderDiagnostic): string {
  return `${chalk.red("✖")} ${diagnostic.message} ${chalk.gray(`[${diagnostic.code}]`)}`;
}

export function formatWarning(warning: string): string {
  return `${chalk.yellow("!")} ${warning}`;
}
