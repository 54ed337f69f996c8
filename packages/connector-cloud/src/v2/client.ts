/**
 * V2 Organization Client
 *
 * REST client for the target organization: fields, sources and mappings.
 */

import {
  v2FieldPageSchema,
  v2SourceListSchema,
  v2SourceMappingsSchema,
  type ITargetOrgService,
  type V2FieldDefinition,
  type V2FieldList,
  type DataSource,
  type MappingRule,
  type V2SourceMappings,
} from '@fieldport/core';
import { CloudHttpClient } from '../http.js';
import { v2BaseUrl, type Environment } from '../environments.js';
import type { ReadRetryListener, RetryConfig } from '../retry.js';

export interface CloudV2ClientConfig {
  /** Organization id */
  orgId: string;
  /** Access token with edit privileges on fields and sources */
  accessToken: string;
  /** Deployment environment (default: prod) */
  environment?: Environment;
  /** Explicit base URL; overrides environment */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Page size when listing fields (default: 1000) */
  pageSize?: number;
  retries?: RetryConfig;
  onRetry?: ReadRetryListener;
}

export class CloudV2Client implements ITargetOrgService {
  private readonly http: CloudHttpClient;
  private readonly orgPath: string;
  private readonly pageSize: number;

  constructor(config: CloudV2ClientConfig) {
    this.http = new CloudHttpClient({
      orgLabel: `v2:${config.orgId}`,
      baseUrl: config.baseUrl ?? v2BaseUrl(config.environment ?? 'prod'),
      accessToken: config.accessToken,
      timeoutMs: config.timeoutMs,
      retries: config.retries,
      onRetry: config.onRetry,
    });
    this.orgPath = `/rest/organizations/${encodeURIComponent(config.orgId)}`;
    this.pageSize = config.pageSize ?? 1000;
  }

  /**
   * List all fields, following pages until totalPages is reached
   */
  async fieldsGet(): Promise<V2FieldList> {
    const items: V2FieldDefinition[] = [];
    let page = 0;
    let totalPages = 1;

    while (page < totalPages) {
      const params = new URLSearchParams({
        page: String(page),
        perPage: String(this.pageSize),
      });
      const result = await this.http.get(
        `${this.orgPath}/indexes/page/fields?${params.toString()}`,
        v2FieldPageSchema
      );
      items.push(...result.items);
      totalPages = result.totalPages;
      page++;
    }

    return { items };
  }

  async fieldsCreateBatch(fields: V2FieldDefinition[]): Promise<void> {
    await this.http.send('POST', `${this.orgPath}/indexes/fields/batch/create`, fields);
  }

  async sourcesGet(): Promise<DataSource[]> {
    return this.http.get(`${this.orgPath}/sources`, v2SourceListSchema);
  }

  async mappingsGet(sourceId: string): Promise<V2SourceMappings> {
    return this.http.get(
      `${this.orgPath}/sources/${encodeURIComponent(sourceId)}/mappings`,
      v2SourceMappingsSchema
    );
  }

  async mappingsCommonAdd(sourceId: string, rebuild: boolean, rule: MappingRule): Promise<void> {
    const params = new URLSearchParams({ rebuild: String(rebuild) });
    await this.http.send(
      'POST',
      `${this.orgPath}/sources/${encodeURIComponent(sourceId)}/mappings/rules?${params.toString()}`,
      rule
    );
  }
}
