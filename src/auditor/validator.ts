// Schema Validator - Strict validation with fail-closed behavior

import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { SecurityGroup as Ec2SecurityGroup } from '@aws-sdk/client-ec2';
import { auditConfigSchema } from '../schemas/config.schema.js';
import { securityGroupsDumpSchema } from '../schemas/security-groups.schema.js';
import type { AuditConfig } from '../types/audit.js';

export interface SecurityGroupsDump {
  SecurityGroups: Ec2SecurityGroup[];
}

export class ValidationError extends Error {
  public readonly errors: ErrorObject[];

  constructor(message: string, errors: ErrorObject[]) {
    super(message);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

export class SchemaValidator {
  private validateConfig: ValidateFunction<AuditConfig>;
  private validateDump: ValidateFunction<SecurityGroupsDump>;

  constructor() {
    const ajv = new Ajv({
      strict: true,
      allErrors: true,
      verbose: true
    });
    addFormats.default(ajv);

    this.validateConfig = ajv.compile<AuditConfig>(auditConfigSchema);
    this.validateDump = ajv.compile<SecurityGroupsDump>(securityGroupsDumpSchema);
  }

  // Fail-closed: throws on invalid configuration
  assertValidConfig(data: unknown): asserts data is AuditConfig {
    if (!this.validateConfig(data)) {
      throw new ValidationError(
        'Configuration validation failed',
        this.validateConfig.errors ?? []
      );
    }
  }

  // Fail-closed: throws on a malformed security group dump
  assertValidDump(data: unknown): asserts data is SecurityGroupsDump {
    if (!this.validateDump(data)) {
      throw new ValidationError(
        'Security group dump validation failed',
        this.validateDump.errors ?? []
      );
    }
  }

  getConfigErrors(data: unknown): ErrorObject[] {
    this.validateConfig(data);
    return this.validateConfig.errors ?? [];
  }
}

// Renders ajv errors as "/path message" lines
export function describeErrors(errors: ErrorObject[]): string[] {
  return errors.map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`.trim());
}
