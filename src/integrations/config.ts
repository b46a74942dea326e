// Configuration System - Load and validate auditor configuration
// Supports: environment variables (SES_SENDER, SES_RECIPIENT, AWS_REGION, AWS_PROFILE)

import { SchemaValidator, describeErrors } from '../auditor/validator.js';
import type { AuditConfig } from '../types/audit.js';

export const DEFAULT_REGION = 'us-east-1';

export class ConfigurationError extends Error {
  public readonly problems: string[];

  constructor(message: string, problems: string[]) {
    super(`${message}: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

type Env = Record<string, string | undefined>;

/**
 * Returns the bare address of an SES mailbox, so that
 * `Security Audit <alerts@example.com>` checks as `alerts@example.com`.
 */
export function mailboxAddress(value: string): string {
  const match = /^[^<>]*<([^<>]+)>$/.exec(value.trim());
  return match ? match[1].trim() : value.trim();
}

export class ConfigLoader {
  private config: Partial<AuditConfig>;
  private validator: SchemaValidator;

  constructor(validator: SchemaValidator = new SchemaValidator()) {
    this.config = { region: DEFAULT_REGION };
    this.validator = validator;
  }

  // Load from environment variables
  loadFromEnv(env: Env = process.env): Partial<AuditConfig> {
    if (env.SES_SENDER) {
      this.config.sender = env.SES_SENDER.trim();
    }
    if (env.SES_RECIPIENT) {
      this.config.recipient = env.SES_RECIPIENT.trim();
    }
    if (env.AWS_REGION) {
      this.config.region = env.AWS_REGION.trim();
    }
    if (env.AWS_PROFILE) {
      this.config.profile = env.AWS_PROFILE.trim();
    }

    return this.config;
  }

  getConfig(): Partial<AuditConfig> {
    return this.config;
  }

  // Validate configuration
  validate(): string[] {
    const errors: string[] = [];

    if (!this.config.sender) {
      errors.push('SES_SENDER is required');
    }
    if (!this.config.recipient) {
      errors.push('SES_RECIPIENT is required');
    }
    if (errors.length > 0) {
      return errors;
    }

    return describeErrors(this.validator.getConfigErrors(this.addressesOnly()));
  }

  private addressesOnly(): Partial<AuditConfig> {
    const { sender, recipient } = this.config;
    return {
      ...this.config,
      ...(sender === undefined ? {} : { sender: mailboxAddress(sender) }),
      ...(recipient === undefined ? {} : { recipient: mailboxAddress(recipient) }),
    };
  }

  /**
   * Reads the environment and returns a validated configuration.
   * Throws ConfigurationError listing every problem found.
   */
  load(env: Env = process.env): AuditConfig {
    this.config = { region: DEFAULT_REGION };
    this.loadFromEnv(env);

    const errors = this.validate();
    if (errors.length > 0) {
      throw new ConfigurationError('Invalid auditor configuration', errors);
    }

    const checked = this.addressesOnly();
    this.validator.assertValidConfig(checked);
    console.log(`[Config] Loaded configuration for region ${checked.region}`);
    // SES takes the display-name form unchanged
    return {
      ...checked,
      sender: this.config.sender ?? checked.sender,
      recipient: this.config.recipient ?? checked.recipient,
    };
  }
}
