/**
 * CLI configuration
 */

import { Command } from "commander";
import { createWhoamiCommand } from "./commands/whoami.js";
import { readFileSync } from "node:fs";
import { join } from "node:path";

/**
 * Get package version
 */
function getVersion(): string {
  try {
    const packageJsonPath = join(__dirname, "../../package.json");
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
    if (
      packageJson &&
      typeof packageJson === "object" &&
      "version" in packageJson &&
      typeof packageJson.version === "string"
    ) {
      return packageJson.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

/**
 * Create CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("account-probe")
    .description("Resolve AWS credentials and identify the owning account")
    .version(getVersion());

  program.addCommand(createWhoamiCommand());

  return program;
}
