/**
 * Metadata endpoint override
 */

import type { EnvironmentSnapshot } from '../config/env.js';
import { noopLogger, type Logger } from '../utils/logger.js';

/**
 * Options carrying an optional metadata endpoint
 */
export interface EndpointOptions {
  endpoint?: string;
}

/**
 * Record the AWS_METADATA_URL override (if any) into `options`
 *
 * @returns The override, or '' when the default endpoint should be used
 */
export function setOptionalEndpoint(
  env: EnvironmentSnapshot,
  options: EndpointOptions,
  logger: Logger = noopLogger
): string {
  const endpoint = env.metadataUrl;
  if (endpoint) {
    logger.info('Setting custom metadata endpoint', { endpoint });
    options.endpoint = endpoint;
    return endpoint;
  }
  return '';
}
