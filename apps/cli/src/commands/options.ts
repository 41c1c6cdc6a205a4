import { InvalidArgumentError } from "commander";

export function parseIndent(value: string): number {
  const indent = Number.parseInt(value, 10);
  if (Number.isNaN(indent) || indent < 0 || indent > 10) {
    throw new InvalidArgumentError("Indent must be a number between 0 and 10.");
  }
  return indent;
}
