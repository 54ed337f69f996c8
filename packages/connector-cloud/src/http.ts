/**
 * Cloud HTTP Client
 *
 * JSON-over-HTTPS transport shared by the V1 and V2 clients.
 * Maps transport failures to ConnectorError and validates every response body.
 */

import type { z } from 'zod';
import { ConnectorError, formatZodIssues } from '@fieldport/core';
import { ReadRetryPolicy, type ReadRetryListener, type RetryConfig } from './retry.js';

export interface CloudHttpClientConfig {
  /** Label used in error messages, e.g. "v2:my-org" */
  orgLabel: string;
  /** API base URL without trailing slash */
  baseUrl: string;
  /** OAuth access token */
  accessToken: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Retry policy for reads (writes are never retried) */
  retries?: RetryConfig;
  /** Called before each repeated read */
  onRetry?: ReadRetryListener;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT';

export class CloudHttpClient {
  private readonly config: CloudHttpClientConfig;
  private readonly readRetries: ReadRetryPolicy;

  constructor(config: CloudHttpClientConfig) {
    this.config = { ...config, baseUrl: config.baseUrl.replace(/\/+$/, '') };
    this.readRetries = new ReadRetryPolicy(config.retries, config.onRetry);
  }

  /**
   * GET a resource and validate its body
   */
  async get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const body = await this.readRetries.run(this.config.orgLabel, path, () =>
      this.request('GET', path)
    );
    return this.parse(path, body, schema);
  }

  /**
   * Send a write request. The response body is ignored.
   */
  async send(method: Exclude<HttpMethod, 'GET'>, path: string, body: unknown): Promise<void> {
    await this.request(method, path, body);
  }

  private parse<T>(path: string, body: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: formatZodIssues(`Unexpected response from ${path}`, result.error),
        orgId: this.config.orgLabel,
        suggestion: 'Check that the organization id and environment point at the right platform.',
      });
    }
    return result.data;
  }

  private async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const url = `${this.config.baseUrl}${path}`;
    const timeoutMs = this.config.timeoutMs ?? 30_000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.config.accessToken}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new ConnectorError({
          code: 'TIMEOUT',
          message: `${method} ${path} timed out after ${timeoutMs}ms`,
          orgId: this.config.orgLabel,
          suggestion: 'Increase timeoutMs or check network connectivity.',
        });
      }

      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `Failed to reach ${this.config.baseUrl}: ${err instanceof Error ? err.message : String(err)}`,
        orgId: this.config.orgLabel,
        cause: err instanceof Error ? err : undefined,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw await this.toConnectorError(method, path, response);
    }

    // Handle 204 No Content and empty write acknowledgements
    const text = await response.text();
    if (!text) {
      return undefined;
    }

    try {
      return JSON.parse(text) as unknown;
    } catch (err) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `${method} ${path} returned a body that is not JSON`,
        orgId: this.config.orgLabel,
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  private async toConnectorError(
    method: HttpMethod,
    path: string,
    response: Response
  ): Promise<ConnectorError> {
    let errorMessage = `HTTP ${response.status}`;

    try {
      const errorBody = (await response.json()) as { message?: unknown };
      if (typeof errorBody.message === 'string' && errorBody.message) {
        errorMessage = errorBody.message;
      }
    } catch {
      // Error bodies are not always JSON; keep the status line
    }

    const context = { method, path, status: response.status };
    const orgId = this.config.orgLabel;

    switch (response.status) {
      case 401:
        return new ConnectorError({
          code: 'AUTHENTICATION_FAILED',
          message: `Authentication failed: ${errorMessage}`,
          orgId,
          context,
          suggestion: 'Check the access token for this organization.',
        });
      case 403:
        return new ConnectorError({
          code: 'PERMISSION_DENIED',
          message: `Permission denied: ${errorMessage}`,
          orgId,
          context,
          suggestion: 'Grant the token privileges to edit fields and sources.',
        });
      case 404:
        return new ConnectorError({
          code: 'NOT_FOUND',
          message: `Not found: ${method} ${path}`,
          orgId,
          context,
          suggestion: 'Check the organization id and environment.',
        });
      case 429:
        return new ConnectorError({
          code: 'RATE_LIMITED',
          message: 'API rate limit exceeded',
          orgId,
          context,
          suggestion: 'Wait and retry, or configure read retries.',
        });
      default:
        return new ConnectorError({
          code: method === 'GET' ? 'READ_FAILED' : 'WRITE_FAILED',
          message: `API error on ${method} ${path}: ${errorMessage}`,
          orgId,
          context,
        });
    }
  }
}
