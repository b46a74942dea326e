/**
 * AWS Security Group Source
 * Lists the security groups of one account/region and maps them to the
 * auditor's domain records:
 * - EC2: DescribeSecurityGroups, every page through the SDK paginator
 * - File: a saved `aws ec2 describe-security-groups` JSON dump
 */

import { readFile } from 'fs/promises';
import {
  EC2Client,
  paginateDescribeSecurityGroups,
  type IpPermission,
  type SecurityGroup as Ec2SecurityGroup,
} from '@aws-sdk/client-ec2';
import { fromIni } from '@aws-sdk/credential-providers';
import { SchemaValidator, type SecurityGroupsDump } from '../auditor/validator.js';
import type { InboundPermission, SecurityGroup } from '../types/audit.js';

// ============ TYPES ============

export interface SecurityGroupSource {
  listSecurityGroups(): Promise<SecurityGroup[]>;
}

export interface AWSClientConfig {
  region: string;
  profile?: string;
}

export class CollectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CollectionError';
  }
}

// ============ MAPPING ============

export function toSecurityGroup(sg: Ec2SecurityGroup & { GroupId: string }): SecurityGroup {
  return {
    id: sg.GroupId,
    name: sg.GroupName || undefined,
    permissions: (sg.IpPermissions || []).map(toInboundPermission),
  };
}

function toInboundPermission(rule: IpPermission): InboundPermission {
  const permission: InboundPermission = {
    cidrs: (rule.IpRanges || [])
      .map(range => range.CidrIp)
      .filter((cidr): cidr is string => typeof cidr === 'string'),
  };
  if (rule.IpProtocol !== undefined) permission.protocol = rule.IpProtocol;
  if (rule.FromPort !== undefined) permission.fromPort = rule.FromPort;
  if (rule.ToPort !== undefined) permission.toPort = rule.ToPort;
  return permission;
}

function mapGroups(groups: Ec2SecurityGroup[], origin: string): SecurityGroup[] {
  const mapped: SecurityGroup[] = [];

  for (const sg of groups) {
    if (!sg.GroupId) {
      console.warn(`[${origin}] Skipping security group without GroupId (${sg.GroupName || 'Unnamed'})`);
      continue;
    }
    mapped.push(toSecurityGroup({ ...sg, GroupId: sg.GroupId }));
  }

  return mapped;
}

// ============ EC2 SOURCE ============

export function createEC2Client(config: AWSClientConfig): EC2Client {
  return new EC2Client({
    region: config.region,
    credentials: config.profile ? fromIni({ profile: config.profile }) : undefined,
  });
}

export class Ec2SecurityGroupSource implements SecurityGroupSource {
  private client: EC2Client;

  constructor(client: EC2Client) {
    this.client = client;
  }

  async listSecurityGroups(): Promise<SecurityGroup[]> {
    const groups: Ec2SecurityGroup[] = [];
    let pages = 0;

    console.log('[EC2] Describing security groups...');

    try {
      for await (const page of paginateDescribeSecurityGroups({ client: this.client }, {})) {
        groups.push(...(page.SecurityGroups || []));
        pages++;
      }
    } catch (err) {
      const errorMsg = err instanceof Error ? err.message : String(err);
      console.error(`[EC2] DescribeSecurityGroups failed: ${errorMsg}`);
      throw new CollectionError(`Failed to list security groups: ${errorMsg}`, { cause: err });
    }

    console.log(`[EC2] Found ${groups.length} security groups in ${pages} page(s)`);
    return mapGroups(groups, 'EC2');
  }
}

// ============ FILE SOURCE ============

export class FileSecurityGroupSource implements SecurityGroupSource {
  private filePath: string;
  private validator: SchemaValidator;

  constructor(filePath: string, validator: SchemaValidator = new SchemaValidator()) {
    this.filePath = filePath;
    this.validator = validator;
  }

  async listSecurityGroups(): Promise<SecurityGroup[]> {
    let parsed: unknown;

    try {
      parsed = JSON.parse(await readFile(this.filePath, 'utf-8'));
    } catch (err) {
      const errorMsg = err instanceof Error ? err.message : String(err);
      throw new CollectionError(`Failed to read ${this.filePath}: ${errorMsg}`, { cause: err });
    }

    const dump = this.toDump(parsed);
    console.log(`[File] Loaded ${dump.SecurityGroups.length} security groups from ${this.filePath}`);
    return mapGroups(dump.SecurityGroups, 'File');
  }

  private toDump(data: unknown): SecurityGroupsDump {
    try {
      this.validator.assertValidDump(data);
      return data;
    } catch (err) {
      throw new CollectionError(`Invalid security group dump in ${this.filePath}`, { cause: err });
    }
  }
}
