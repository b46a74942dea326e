// Security Group Auditor - Lambda entry point
// Configuration is validated at cold start; a missing SES_SENDER or
// SES_RECIPIENT fails the container before any audit runs.

import type { Handler } from 'aws-lambda';
import { ConfigLoader } from './integrations/config.js';
import { createAuditHandler, createAuditPipeline } from './pipeline/index.js';
import type { AuditResponse } from './types/audit.js';

const config = new ConfigLoader().load();

export const handler: Handler<unknown, AuditResponse> = createAuditHandler(createAuditPipeline(config));
