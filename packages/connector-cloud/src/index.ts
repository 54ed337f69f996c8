/**
 * @fieldport/connector-cloud
 *
 * REST clients for the source (V1) and target (V2) organizations
 */

export { CloudV1Client } from './v1/client.js';
export type { CloudV1ClientConfig } from './v1/client.js';

export { CloudV2Client } from './v2/client.js';
export type { CloudV2ClientConfig } from './v2/client.js';

export { CloudHttpClient } from './http.js';
export type { CloudHttpClientConfig, HttpMethod } from './http.js';

export { translateV1Field, translateFieldType } from './field-translation.js';

export { v1BaseUrl, v2BaseUrl } from './environments.js';
export type { Environment } from './environments.js';

export { ReadRetryPolicy, isRetryableConnectorError } from './retry.js';
export type { RetryConfig, ReadRetryEvent, ReadRetryListener } from './retry.js';
