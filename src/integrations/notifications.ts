/**
 * Notification Integration for the Security Group Auditor
 *
 * Sends the audit report as a plain-text email through Amazon SES.
 * Empty reports are never sent.
 */

import {
  SESClient,
  SendEmailCommand,
  type SendEmailCommandOutput,
} from '@aws-sdk/client-ses';
import { fromIni } from '@aws-sdk/credential-providers';
import { describeViolation } from '../auditor/rule-collector.js';
import type { DispatchOutcome, Violation } from '../types/audit.js';
import type { AWSClientConfig } from './aws-scanner.js';

export const REPORT_SUBJECT = 'Security Group Audit Alert';
export const REPORT_HEADER = 'Security Group Audit Report:';

export interface MailMessage {
  from: string;
  to: string[];
  subject: string;
  body: string;
}

export interface MailSender {
  /** Resolves with the provider's message id, when it returns one. */
  send(message: MailMessage): Promise<string | undefined>;
}

/** The slice of SESClient the sender needs. */
export interface EmailApi {
  send(command: SendEmailCommand): Promise<SendEmailCommandOutput>;
}

export class DispatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DispatchError';
  }
}

export function createSESClient(config: AWSClientConfig): SESClient {
  return new SESClient({
    region: config.region,
    credentials: config.profile ? fromIni({ profile: config.profile }) : undefined,
  });
}

export class SesMailSender implements MailSender {
  private client: EmailApi;

  constructor(client: EmailApi) {
    this.client = client;
  }

  async send(message: MailMessage): Promise<string | undefined> {
    const response = await this.client.send(new SendEmailCommand({
      Source: message.from,
      Destination: { ToAddresses: message.to },
      Message: {
        Subject: { Data: message.subject },
        Body: { Text: { Data: message.body } },
      },
    }));

    console.log(`[SES] Email sent to ${message.to.join(', ')} (${response.MessageId ?? 'no message id'})`);
    return response.MessageId;
  }
}

/**
 * Header line, a blank line, then one description line per violation
 */
export function formatReport(violations: readonly Violation[]): string {
  return [REPORT_HEADER, '', ...violations.map(describeViolation)].join('\n');
}

export class ReportDispatcher {
  private mailer: MailSender;

  constructor(mailer: MailSender) {
    this.mailer = mailer;
  }

  async sendReport(
    violations: readonly Violation[],
    sender: string,
    recipient: string
  ): Promise<DispatchOutcome> {
    if (violations.length === 0) {
      console.log('[NOTIFY] No violations, report skipped');
      return { status: 'skipped' };
    }

    const recipients = [recipient];

    try {
      const messageId = await this.mailer.send({
        from: sender,
        to: recipients,
        subject: REPORT_SUBJECT,
        body: formatReport(violations),
      });
      return messageId === undefined
        ? { status: 'sent', recipients }
        : { status: 'sent', messageId, recipients };
    } catch (err) {
      const errorMsg = err instanceof Error ? err.message : String(err);
      console.error(`[NOTIFY] Report email failed: ${errorMsg}`);
      throw new DispatchError(`Failed to send audit report to ${recipient}: ${errorMsg}`, { cause: err });
    }
  }
}
