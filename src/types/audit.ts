// Security Group Audit Types - Domain records shared by collector, dispatcher and pipeline

export const UNRESTRICTED_CIDR = '0.0.0.0/0';
export const UNNAMED_GROUP = 'Unnamed';

export interface InboundPermission {
  cidrs?: string[];
  protocol?: string;
  fromPort?: number;
  toPort?: number;
}

export interface SecurityGroup {
  id: string;
  name?: string;
  permissions?: InboundPermission[];
}

export interface Violation {
  readonly groupId: string;
  readonly groupName: string;
  readonly cidr: string;
  readonly protocol?: string;
  readonly fromPort?: number;
  readonly toPort?: number;
}

export interface AuditResult {
  violations: Violation[];
  count: number;
  timestamp: string;
}

export interface AuditResponse {
  statusCode: number;
  body: string;
}

export type DispatchOutcome =
  | { status: 'sent'; messageId?: string; recipients: string[] }
  | { status: 'skipped' };

export interface AuditConfig {
  sender: string;
  recipient: string;
  region: string;
  profile?: string;
}
