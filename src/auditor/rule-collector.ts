// Rule Collector - Flags inbound rules open to any IPv4 source

import {
  UNNAMED_GROUP,
  UNRESTRICTED_CIDR,
  type AuditResult,
  type InboundPermission,
  type SecurityGroup,
  type Violation
} from '../types/audit.js';

/**
 * Walks groups, then their inbound permissions, then each permission's CIDR
 * entries, and emits one violation per entry equal to `0.0.0.0/0`.
 * Output order follows input order; duplicates are kept.
 */
export function findViolations(groups: readonly SecurityGroup[]): Violation[] {
  const violations: Violation[] = [];

  for (const group of groups) {
    const groupName = group.name || UNNAMED_GROUP;

    for (const permission of group.permissions ?? []) {
      for (const cidr of permission.cidrs ?? []) {
        if (cidr !== UNRESTRICTED_CIDR) continue;

        violations.push({
          groupId: group.id,
          groupName,
          cidr,
          ...ruleDetails(permission)
        });
      }
    }
  }

  return violations;
}

export function summarizeAudit(groups: readonly SecurityGroup[]): AuditResult {
  const violations = findViolations(groups);
  return {
    violations,
    count: violations.length,
    timestamp: new Date().toISOString()
  };
}

// One report line per violation
export function describeViolation(violation: Violation): string {
  const line = `Security Group '${violation.groupName}' (${violation.groupId}) allows inbound access from ${violation.cidr}.`;
  if (!violation.protocol) return line;
  return `${line} Rule: ${violation.protocol} ${describePorts(violation)}.`;
}

function describePorts(violation: Violation): string {
  const { protocol, fromPort, toPort } = violation;
  if (protocol === '-1' || fromPort === undefined) return 'all ports';
  if (toPort === undefined || toPort === fromPort) return String(fromPort);
  return `${fromPort}-${toPort}`;
}

function ruleDetails(permission: InboundPermission): Pick<Violation, 'protocol' | 'fromPort' | 'toPort'> {
  const details: { protocol?: string; fromPort?: number; toPort?: number } = {};
  if (permission.protocol !== undefined) details.protocol = permission.protocol;
  if (permission.fromPort !== undefined) details.fromPort = permission.fromPort;
  if (permission.toPort !== undefined) details.toPort = permission.toPort;
  return details;
}
