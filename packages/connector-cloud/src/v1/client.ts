/**
 * V1 Organization Client
 *
 * Read-only REST client for the source organization.
 */

import {
  v1FieldListSchema,
  v1SourceListSchema,
  type ISourceOrgService,
  type V1FieldDefinition,
  type V1SourceList,
} from '@fieldport/core';
import { CloudHttpClient } from '../http.js';
import { v1BaseUrl, type Environment } from '../environments.js';
import type { ReadRetryListener, RetryConfig } from '../retry.js';

export interface CloudV1ClientConfig {
  /** Organization (workgroup) id */
  orgId: string;
  /** Access token with read privileges on fields and sources */
  accessToken: string;
  /** Deployment environment (default: prod) */
  environment?: Environment;
  /** Explicit base URL; overrides environment */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  retries?: RetryConfig;
  onRetry?: ReadRetryListener;
}

export class CloudV1Client implements ISourceOrgService {
  private readonly http: CloudHttpClient;
  private readonly orgPath: string;

  constructor(config: CloudV1ClientConfig) {
    this.http = new CloudHttpClient({
      orgLabel: `v1:${config.orgId}`,
      baseUrl: config.baseUrl ?? v1BaseUrl(config.environment ?? 'prod'),
      accessToken: config.accessToken,
      timeoutMs: config.timeoutMs,
      retries: config.retries,
      onRetry: config.onRetry,
    });
    this.orgPath = `/rest/workgroups/${encodeURIComponent(config.orgId)}`;
  }

  async fieldsGet(): Promise<V1FieldDefinition[]> {
    return this.http.get(`${this.orgPath}/fields`, v1FieldListSchema);
  }

  async sourcesGet(): Promise<V1SourceList> {
    return this.http.get(`${this.orgPath}/sources`, v1SourceListSchema);
  }
}
