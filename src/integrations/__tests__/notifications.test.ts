import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { SendEmailCommand, SendEmailCommandOutput } from '@aws-sdk/client-ses';
import {
  DispatchError,
  ReportDispatcher,
  SesMailSender,
  formatReport,
  type MailMessage,
  type MailSender,
} from '../notifications.js';
import type { Violation } from '../../types/audit.js';

const SENDER = 'alerts@example.com';
const RECIPIENT = 'secops@example.com';

const web: Violation = { groupId: 'sg-1', groupName: 'web', cidr: '0.0.0.0/0', protocol: 'tcp', fromPort: 22, toPort: 22 };
const legacy: Violation = { groupId: 'sg-2', groupName: 'Unnamed', cidr: '0.0.0.0/0' };

function fakeMailer() {
  const send = vi.fn<(message: MailMessage) => Promise<string | undefined>>();
  const mailer: MailSender = { send };
  return { mailer, send };
}

describe('formatReport', () => {
  it('puts a header, a blank line, then one line per violation', () => {
    expect(formatReport([web, legacy])).toBe(
      [
        'Security Group Audit Report:',
        '',
        "Security Group 'web' (sg-1) allows inbound access from 0.0.0.0/0. Rule: tcp 22.",
        "Security Group 'Unnamed' (sg-2) allows inbound access from 0.0.0.0/0.",
      ].join('\n')
    );
  });
});

describe('ReportDispatcher', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('skips an empty report without calling the mailer', async () => {
    const { mailer, send } = fakeMailer();

    const outcome = await new ReportDispatcher(mailer).sendReport([], SENDER, RECIPIENT);

    expect(outcome).toEqual({ status: 'skipped' });
    expect(send).not.toHaveBeenCalled();
  });

  it('sends one email listing violations in order', async () => {
    const { mailer, send } = fakeMailer();
    send.mockResolvedValue('msg-1');

    const outcome = await new ReportDispatcher(mailer).sendReport([web, legacy], SENDER, RECIPIENT);

    expect(outcome).toEqual({ status: 'sent', messageId: 'msg-1', recipients: [RECIPIENT] });
    expect(send).toHaveBeenCalledTimes(1);

    const message = send.mock.calls[0][0];
    expect(message.from).toBe(SENDER);
    expect(message.to).toEqual([RECIPIENT]);
    expect(message.subject).toBe('Security Group Audit Alert');
    expect(message.body.split('\n').slice(2)).toEqual([
      "Security Group 'web' (sg-1) allows inbound access from 0.0.0.0/0. Rule: tcp 22.",
      "Security Group 'Unnamed' (sg-2) allows inbound access from 0.0.0.0/0.",
    ]);
  });

  it('omits the message id when the mailer returns none', async () => {
    const { mailer, send } = fakeMailer();
    send.mockResolvedValue(undefined);

    const outcome = await new ReportDispatcher(mailer).sendReport([web], SENDER, RECIPIENT);

    expect(outcome).toEqual({ status: 'sent', recipients: [RECIPIENT] });
  });

  it('surfaces mailer failures as DispatchError', async () => {
    const { mailer, send } = fakeMailer();
    const failure = new Error('Email address is not verified.');
    send.mockRejectedValue(failure);

    const err = await new ReportDispatcher(mailer).sendReport([web], SENDER, RECIPIENT).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DispatchError);
    if (err instanceof DispatchError) {
      expect(err.message).toBe('Failed to send audit report to secops@example.com: Email address is not verified.');
      expect(err.cause).toBe(failure);
    }
    expect(send).toHaveBeenCalledTimes(1);
  });
});

describe('SesMailSender', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends a plain-text SES email', async () => {
    const send = vi.fn<(command: SendEmailCommand) => Promise<SendEmailCommandOutput>>()
      .mockResolvedValue({ MessageId: 'ses-123', $metadata: {} });

    const messageId = await new SesMailSender({ send }).send({
      from: SENDER,
      to: [RECIPIENT],
      subject: 'Security Group Audit Alert',
      body: 'Security Group Audit Report:\n\nline',
    });

    expect(messageId).toBe('ses-123');
    expect(send.mock.calls[0][0].input).toEqual({
      Source: SENDER,
      Destination: { ToAddresses: [RECIPIENT] },
      Message: {
        Subject: { Data: 'Security Group Audit Alert' },
        Body: { Text: { Data: 'Security Group Audit Report:\n\nline' } },
      },
    });
  });

  it('lets SES errors reach the dispatcher', async () => {
    const send = vi.fn<(command: SendEmailCommand) => Promise<SendEmailCommandOutput>>()
      .mockRejectedValue(new Error('Throttling: Maximum sending rate exceeded.'));

    await expect(
      new SesMailSender({ send }).send({ from: SENDER, to: [RECIPIENT], subject: 's', body: 'b' })
    ).rejects.toThrow('Throttling: Maximum sending rate exceeded.');
  });
});
