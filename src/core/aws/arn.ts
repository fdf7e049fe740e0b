/**
 * ARN parsing
 */

import type { AWSAccountInfo } from '../../types/aws.js';

/**
 * Extract partition and account ID from an ARN
 * (`arn:<partition>:<service>:<region>:<account>:<resource>`)
 *
 * @throws Error if the ARN has fewer than 5 colon-separated segments
 */
export function parseAccountInfoFromArn(arn: string): AWSAccountInfo {
  const parts = arn.split(':');
  if (parts.length < 5) {
    throw new Error(`Unable to parse ID from invalid ARN: ${JSON.stringify(arn)}`);
  }

  return {
    partition: parts[1],
    accountId: parts[4],
  };
}
