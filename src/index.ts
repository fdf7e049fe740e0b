/**
 * account-probe - AWS credential chain and account discovery
 *
 * Main library exports
 */

// Export types
export * from './types/config.js';
export * from './types/aws.js';

// Export core functionality
export * from './core/config/index.js';
export * from './core/aws/index.js';
export { noopLogger, type Logger, type LogLevel, type LogFields } from './core/utils/logger.js';
export { parseDuration, formatDuration } from './core/utils/duration.js';
