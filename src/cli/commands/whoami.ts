/**
 * Whoami command
 */

import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import * as logger from "../utils/logger.js";
import { loadConfig } from "../../core/config/index.js";
import { readEnvironment } from "../../core/config/env.js";
import {
  buildCredentialChain,
  createIAMClient,
  createSTSClient,
  getAccountInfo,
} from "../../core/aws/index.js";

/**
 * Whoami command options
 */
interface WhoamiOptions {
  env?: string;
  region?: string;
  profile?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Create whoami command
 */
export function createWhoamiCommand(): Command {
  const command = new Command("whoami");

  command
    .description("Resolve AWS credentials and show the owning account")
    .option("-e, --env <environment>", "Environment name used to pick .env files")
    .option("-r, --region <region>", "AWS region")
    .option("-p, --profile <profile>", "AWS profile name")
    .option("--access-key-id <id>", "Explicit AWS access key ID")
    .option("--secret-access-key <secret>", "Explicit AWS secret access key")
    .option("--session-token <token>", "Explicit AWS session token")
    .option("--json", "Output as JSON")
    .option("-v, --verbose", "Show credential chain decisions")
    .action(async (options: WhoamiOptions) => {
      try {
        await whoamiCommand(options);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(message);
        process.exit(1);
      }
    });

  return command;
}

/**
 * Whoami command handler
 */
async function whoamiCommand(options: WhoamiOptions): Promise<void> {
  const { json = false } = options;
  const isVerbose = options.verbose === true || process.env.ACCOUNT_PROBE_DEBUG === "true";

  const config = await loadConfig({
    env: options.env,
    region: options.region,
    profile: options.profile,
    accessKeyId: options.accessKeyId,
    secretAccessKey: options.secretAccessKey,
    sessionToken: options.sessionToken,
  });

  // Snapshot after .env files are loaded
  const env = readEnvironment();
  const coreLogger = logger.createConsoleLogger({ verbose: isVerbose });

  const spinner = json || isVerbose ? null : ora("Resolving AWS credentials...").start();

  try {
    const chain = await buildCredentialChain(config, { env, logger: coreLogger });
    const { source, profile } = await chain.resolve();

    if (spinner) spinner.text = "Looking up account...";

    const accountInfo = await getAccountInfo({
      iam: createIAMClient(config, chain),
      sts: createSTSClient(config, chain),
      source,
      env,
      logger: coreLogger,
    });

    spinner?.stop();

    if (json) {
      console.log(
        JSON.stringify(
          {
            partition: accountInfo.partition,
            accountId: accountInfo.accountId,
            source,
            region: config.region,
          },
          null,
          2
        )
      );
      return;
    }

    logger.success("Credentials resolved");
    logger.keyValue("Source", chalk.cyan(source));
    if (profile) {
      logger.keyValue("Profile", profile);
    }
    logger.keyValue("Region", config.region);
    logger.newline();
    logger.keyValue("Partition", chalk.cyan(accountInfo.partition));
    logger.keyValue("Account ID", chalk.cyan(accountInfo.accountId));
  } catch (error) {
    spinner?.fail("Account lookup failed");
    throw error;
  }
}
