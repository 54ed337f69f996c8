/**
 * Deployment environments and their REST endpoints
 */

export type Environment = 'dev' | 'qa' | 'prod';

const V1_BASE_URLS: Record<Environment, string> = {
  dev: 'https://v1-dev.cloud.example.com',
  qa: 'https://v1-qa.cloud.example.com',
  prod: 'https://v1.cloud.example.com',
};

const V2_BASE_URLS: Record<Environment, string> = {
  dev: 'https://platformdev.cloud.example.com',
  qa: 'https://platformqa.cloud.example.com',
  prod: 'https://platform.cloud.example.com',
};

export function v1BaseUrl(env: Environment): string {
  return V1_BASE_URLS[env];
}

export function v2BaseUrl(env: Environment): string {
  return V2_BASE_URLS[env];
}
