/**
 * Zod schemas for account-probe configuration validation
 */

import { z } from "zod";
import type { ProbeConfig } from "../../types/config.js";

/**
 * AWS credentials schema
 */
const awsCredentialsSchema = z
  .object({
    profile: z.string().min(1, "Profile name cannot be empty").optional(),
    accessKeyId: z.string().optional(),
    secretAccessKey: z.string().optional(),
    sessionToken: z.string().optional(),
  })
  .refine(
    (c) => Boolean(c.accessKeyId) === Boolean(c.secretAccessKey),
    "accessKeyId and secretAccessKey must be provided together"
  )
  .optional();

/**
 * Main account-probe configuration schema
 */
export const configSchema: z.ZodType<ProbeConfig> = z.object({
  region: z
    .string()
    .min(1, "AWS region is required")
    .regex(
      /^[a-z]{2}(-[a-z]+)+-\d+$/,
      "Must be a valid AWS region (e.g., us-east-1)"
    ),
  credentials: awsCredentialsSchema,
});

/**
 * Load config options schema
 */
export const loadConfigOptionsSchema = z.object({
  env: z.string().optional(),
  region: z.string().optional(),
  profile: z.string().optional(),
  accessKeyId: z.string().optional(),
  secretAccessKey: z.string().optional(),
  sessionToken: z.string().optional(),
});

/**
 * Validate config and return typed result
 *
 * @throws Error listing every validation problem
 */
export function validateConfig(config: unknown): ProbeConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw new Error(`Config validation failed:\n${formatZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Validate config without throwing
 */
export function validateConfigSafe(config: unknown) {
  return configSchema.safeParse(config);
}

/**
 * Format Zod validation errors for display
 */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((err) => {
      const path = err.path.length > 0 ? err.path.join(".") : "config";
      return `  - ${path}: ${err.message}`;
    })
    .join("\n");
}
