export type { ISourceOrgService, ITargetOrgService } from './org-service.js';
