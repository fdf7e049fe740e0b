/**
 * Instance metadata service client
 *
 * Every client gets its own NodeHttpHandler and http.Agent with a short timeout,
 * so probing for the metadata service never changes the behaviour of the SDK
 * clients used elsewhere in the process.
 */

import { Agent } from 'node:http';
import { Readable } from 'node:stream';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { HttpRequest, type HttpResponse } from '@smithy/protocol-http';
import { sdkStreamMixin } from '@smithy/util-stream';
import { z } from 'zod';
import type { EnvironmentSnapshot } from '../config/env.js';
import { ENV_METADATA_TIMEOUT } from '../config/env.js';
import { parseDuration, formatDuration } from '../utils/duration.js';
import { noopLogger, type Logger } from '../utils/logger.js';
import { setOptionalEndpoint, type EndpointOptions } from './endpoint.js';
import { toError } from './errors.js';
import type { AWSCredentials, IamInfo } from '../../types/aws.js';

/** Kept low so non-EC2 environments are not stalled */
export const DEFAULT_METADATA_TIMEOUT_MS = 100;

export const DEFAULT_METADATA_ENDPOINT = 'http://169.254.169.254';

/** Largest delay Node timers accept */
export const MAX_METADATA_TIMEOUT_MS = 2147483647;

const TOKEN_TTL_SECONDS = 21600;
const TOKEN_REFRESH_MARGIN_MS = 60 * 1000;
const TOKEN_HEADER = 'x-aws-ec2-metadata-token';
const TOKEN_TTL_HEADER = 'x-aws-ec2-metadata-token-ttl-seconds';

/**
 * Minimal request handler contract; NodeHttpHandler satisfies it
 */
export interface MetadataTransport {
  handle(
    request: HttpRequest,
    options?: { abortSignal?: AbortSignal }
  ): Promise<{ response: HttpResponse }>;
}

export interface MetadataClientOptions extends EndpointOptions {
  /** Deadline for each request, response body included, in milliseconds */
  timeoutMs: number;

  /** Request handler (defaults to an isolated NodeHttpHandler) */
  transport?: MetadataTransport;

  logger?: Logger;

  /** Clock used for session token expiry */
  now?: () => Date;
}

const iamInfoSchema = z.object({
  Code: z.string(),
  LastUpdated: z.string().optional(),
  InstanceProfileArn: z.string().min(1),
  InstanceProfileId: z.string(),
});

const roleCredentialsSchema = z.object({
  Code: z.string(),
  AccessKeyId: z.string().min(1),
  SecretAccessKey: z.string().min(1),
  Token: z.string().optional(),
  Expiration: z.string().optional(),
});

interface MetadataResponse {
  statusCode: number;
  body: string;
}

interface SessionToken {
  value: string;
  refreshAt: number;
}

/**
 * Resolve the metadata client timeout from AWS_METADATA_TIMEOUT, falling back
 * to 100ms when the value is missing, unparsable or not positive. Values
 * beyond what a timer can hold are clamped.
 */
export function resolveMetadataTimeout(
  env: EnvironmentSnapshot,
  logger: Logger = noopLogger
): number {
  let timeoutMs = DEFAULT_METADATA_TIMEOUT_MS;

  const userTimeout = env.metadataTimeout;
  if (userTimeout) {
    try {
      const parsed = parseDuration(userTimeout);
      if (parsed > MAX_METADATA_TIMEOUT_MS) {
        logger.warn(`Value of ${ENV_METADATA_TIMEOUT} is too large, clamping`, {
          value: userTimeout,
          maxMs: MAX_METADATA_TIMEOUT_MS,
        });
        timeoutMs = MAX_METADATA_TIMEOUT_MS;
      } else if (parsed > 0) {
        timeoutMs = parsed;
      } else {
        logger.warn(`Non-positive value of ${ENV_METADATA_TIMEOUT} is meaningless, ignoring`, {
          value: userTimeout,
        });
      }
    } catch (error) {
      logger.warn(`Error converting ${ENV_METADATA_TIMEOUT} to a duration, ignoring`, {
        value: userTimeout,
        error: toError(error).message,
      });
    }
  }

  logger.info(`Setting AWS metadata API timeout to ${formatDuration(timeoutMs)}`);
  return timeoutMs;
}

/**
 * Create an isolated request handler for metadata calls.
 * The overall deadline is enforced by the client through an abort signal.
 */
export function createIsolatedTransport(timeoutMs: number): NodeHttpHandler {
  return new NodeHttpHandler({
    connectionTimeout: timeoutMs,
    httpAgent: new Agent({ keepAlive: false }),
  });
}

/**
 * Strip trailing slashes and assume http:// for a bare host such as 169.254.169.254
 */
export function normalizeEndpoint(endpoint: string): string {
  const trimmed = endpoint.trim().replace(/\/+$/, '');
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

function parseEndpoint(endpoint: string): URL {
  try {
    return new URL(endpoint);
  } catch (error) {
    throw new Error(`Invalid metadata endpoint ${JSON.stringify(endpoint)}: ${toError(error).message}`);
  }
}

export class MetadataClient {
  readonly endpoint: string;
  readonly timeoutMs: number;
  private readonly baseUrl: URL;
  private readonly transport: MetadataTransport;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private token?: SessionToken;
  private tokenRequest?: Promise<string | undefined>;

  constructor(options: MetadataClientOptions) {
    this.endpoint = normalizeEndpoint(options.endpoint ?? DEFAULT_METADATA_ENDPOINT);
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? (() => new Date());
    this.baseUrl = parseEndpoint(this.endpoint);
    this.transport = options.transport ?? createIsolatedTransport(options.timeoutMs);
  }

  /**
   * Check that the metadata service answers with an instance ID.
   * Guards against some other service listening on the same address.
   * When the token request gets no answer at all, no second request is made.
   */
  async available(): Promise<boolean> {
    try {
      const { statusCode, body } = await this.request('meta-data/instance-id');
      const instanceId = body.trim();
      return statusCode === 200 && /^[A-Za-z0-9._-]+$/.test(instanceId);
    } catch (error) {
      this.logger.debug('Metadata availability probe failed', {
        endpoint: this.endpoint,
        error: toError(error).message,
      });
      return false;
    }
  }

  /**
   * Fetch the instance profile identity document
   *
   * @throws Error if the service is unreachable or the document is malformed
   */
  async iamInfo(): Promise<IamInfo> {
    const info = iamInfoSchema.parse(await this.getJson('meta-data/iam/info'));
    if (info.Code !== 'Success') {
      throw new Error(`Failed to get EC2 IAM info: service returned code ${info.Code}`);
    }
    return info;
  }

  /**
   * Fetch credentials for the first role attached to the instance profile
   */
  async roleCredentials(): Promise<AWSCredentials> {
    const listing = await this.getText('meta-data/iam/security-credentials/');
    const roleName = listing
      .split('\n')
      .map((line) => line.trim())
      .find((line) => line.length > 0);

    if (!roleName) {
      throw new Error('No IAM role attached to the instance profile');
    }

    const document = roleCredentialsSchema.parse(
      await this.getJson(`meta-data/iam/security-credentials/${encodeURIComponent(roleName)}`)
    );
    if (document.Code !== 'Success') {
      throw new Error(
        `Failed to get credentials for role ${roleName}: service returned code ${document.Code}`
      );
    }

    return {
      accessKeyId: document.AccessKeyId,
      secretAccessKey: document.SecretAccessKey,
      sessionToken: document.Token,
      expiration: document.Expiration ? new Date(document.Expiration) : undefined,
    };
  }

  private async getText(path: string): Promise<string> {
    const { statusCode, body } = await this.request(path);
    if (statusCode !== 200) {
      throw new Error(`Metadata request for ${path} failed with status ${statusCode}`);
    }
    return body;
  }

  private async getJson(path: string): Promise<unknown> {
    const body = await this.getText(path);
    try {
      return JSON.parse(body);
    } catch {
      throw new Error(`Metadata response for ${path} is not valid JSON`);
    }
  }

  private async request(path: string): Promise<MetadataResponse> {
    const token = await this.getToken();
    const headers: Record<string, string> = {};
    if (token) {
      headers[TOKEN_HEADER] = token;
    }
    return this.send('GET', path, headers);
  }

  /**
   * IMDSv2 session token, reused until shortly before its TTL runs out.
   * A service that refuses to issue one is queried without a token; a
   * transport failure is not cached and propagates to the caller.
   */
  private getToken(): Promise<string | undefined> {
    if (this.token && this.now().getTime() < this.token.refreshAt) {
      return Promise.resolve(this.token.value);
    }
    if (!this.tokenRequest) {
      this.tokenRequest = this.fetchToken().finally(() => {
        this.tokenRequest = undefined;
      });
    }
    return this.tokenRequest;
  }

  private async fetchToken(): Promise<string | undefined> {
    const fetchedAt = this.now().getTime();
    const { statusCode, body } = await this.send('PUT', 'api/token', {
      [TOKEN_TTL_HEADER]: String(TOKEN_TTL_SECONDS),
    });

    const value = body.trim();
    if (statusCode !== 200 || !value) {
      this.logger.debug('Metadata token not issued, continuing without token', {
        status: statusCode,
      });
      return undefined;
    }

    this.token = {
      value,
      refreshAt: fetchedAt + TOKEN_TTL_SECONDS * 1000 - TOKEN_REFRESH_MARGIN_MS,
    };
    return value;
  }

  private async send(
    method: string,
    path: string,
    headers: Record<string, string>
  ): Promise<MetadataResponse> {
    const basePath = this.baseUrl.pathname.replace(/\/+$/, '');
    const request = new HttpRequest({
      method,
      protocol: this.baseUrl.protocol,
      hostname: this.baseUrl.hostname,
      port: this.baseUrl.port ? Number(this.baseUrl.port) : undefined,
      path: `${basePath}/latest/${path}`,
      headers,
    });

    const controller = new AbortController();
    const deadline = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const { response } = await this.transport.handle(request, {
        abortSignal: controller.signal,
      });
      const stream: unknown = response.body;
      if (!(stream instanceof Readable)) {
        return { statusCode: response.statusCode, body: '' };
      }

      // The deadline also covers a body that trickles in
      const stopBody = () => stream.destroy(new Error('Request aborted'));
      if (controller.signal.aborted) {
        stopBody();
      }
      controller.signal.addEventListener('abort', stopBody, { once: true });
      const body = await sdkStreamMixin(stream).transformToString();
      return { statusCode: response.statusCode, body };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(
          `Metadata request for ${path} timed out after ${formatDuration(this.timeoutMs)}`
        );
      }
      throw error;
    } finally {
      clearTimeout(deadline);
    }
  }
}

/**
 * Build a metadata client with the timeout policy and endpoint override
 * taken from the environment snapshot
 */
export function createMetadataClient(options: {
  env: EnvironmentSnapshot;
  logger?: Logger;
  transport?: MetadataTransport;
  /** Already resolved timeout; read from the environment when omitted */
  timeoutMs?: number;
  now?: () => Date;
}): MetadataClient {
  const logger = options.logger ?? noopLogger;
  const clientOptions: MetadataClientOptions = {
    timeoutMs: options.timeoutMs ?? resolveMetadataTimeout(options.env, logger),
    now: options.now,
    transport: options.transport,
    logger,
  };
  setOptionalEndpoint(options.env, clientOptions, logger);
  return new MetadataClient(clientOptions);
}
