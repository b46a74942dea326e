#!/usr/bin/env node
/**
 * Security Group Auditor CLI
 *
 * Runs the same audit as the scheduled Lambda from a terminal.
 *
 * Usage:
 *   sg-auditor                     Audit EC2 security groups and email the report
 *   sg-auditor --groups <file>     Audit a saved describe-security-groups dump
 *   sg-auditor --dry-run           Print the report instead of emailing it
 */

import { resolve } from 'path';
import { describeViolation } from './auditor/rule-collector.js';
import {
  ConfigLoader,
  DEFAULT_REGION,
  Ec2SecurityGroupSource,
  FileSecurityGroupSource,
  createEC2Client,
  ReportDispatcher,
  type MailMessage,
  type MailSender,
  type SecurityGroupSource,
} from './integrations/index.js';
import { toJSONSummary, withLogsOnStderr } from './output/index.js';
import { AuditPipeline, createAuditPipeline, type AuditRun } from './pipeline/index.js';
import type { AuditConfig } from './types/audit.js';

const VERSION = '0.1.0';

// ANSI colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

function c(color: keyof typeof colors, text: string): string {
  return `${colors[color]}${text}${colors.reset}`;
}

interface CliOptions {
  groupsFile?: string;
  dryRun: boolean;
  json: boolean;
  help: boolean;
  version: boolean;
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { dryRun: false, json: false, help: false, version: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--groups' || arg === '-g') {
      const file = args[++i];
      if (!file) throw new Error(`${arg} requires a file path`);
      options.groupsFile = file;
    } else if (arg === '--dry-run' || arg === '-n') {
      options.dryRun = true;
    } else if (arg === '--json' || arg === '-j') {
      options.json = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--version' || arg === '-v') {
      options.version = true;
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  return options;
}

// Prints the message that would have been emailed
class ConsoleMailSender implements MailSender {
  private quiet: boolean;

  constructor(quiet: boolean) {
    this.quiet = quiet;
  }

  async send(message: MailMessage): Promise<string | undefined> {
    if (this.quiet) return undefined;

    console.log(c('dim', `From:    ${message.from}`));
    console.log(c('dim', `To:      ${message.to.join(', ')}`));
    console.log(c('dim', `Subject: ${message.subject}`));
    console.log('');
    console.log(message.body);
    return undefined;
  }
}

function buildPipeline(options: CliOptions): AuditPipeline {
  const loader = new ConfigLoader();
  const source: SecurityGroupSource | undefined = options.groupsFile
    ? new FileSecurityGroupSource(resolve(options.groupsFile))
    : undefined;

  if (!options.dryRun) {
    const config = loader.load();
    return source ? createAuditPipeline(config, source) : createAuditPipeline(config);
  }

  // Dry runs never reach SES, so the addresses are optional
  const env = loader.loadFromEnv();
  const config: AuditConfig = {
    sender: env.sender ?? 'dry-run@localhost',
    recipient: env.recipient ?? 'dry-run@localhost',
    region: env.region ?? DEFAULT_REGION,
    profile: env.profile,
  };

  return new AuditPipeline({
    source: source ?? new Ec2SecurityGroupSource(createEC2Client(config)),
    dispatcher: new ReportDispatcher(new ConsoleMailSender(options.json)),
    config,
  });
}

function displayRun(run: AuditRun, dryRun: boolean): void {
  const { result, dispatch } = run;

  console.log('');
  if (result.count === 0) {
    console.log(c('green', '✓ No security groups allow inbound access from 0.0.0.0/0'));
  } else {
    console.log(c('red', `► Insecure Rules (${result.count}):`));
    for (const violation of result.violations) {
      console.log(`  ${describeViolation(violation)}`);
    }
  }

  console.log('');
  if (dispatch.status === 'sent' && dryRun) {
    console.log(c('yellow', '⚠ Dry run: report printed above, not emailed'));
  } else if (dispatch.status === 'sent') {
    console.log(c('cyan', `✉ Report sent to ${dispatch.recipients.join(', ')}`));
  } else {
    console.log(c('dim', 'No report sent'));
  }
  console.log(run.response.body);
}

function showHelp(): void {
  console.log(`
${c('cyan', 'Security Group Auditor')} - Flags inbound rules open to 0.0.0.0/0
${c('dim', `Version ${VERSION}`)}

${c('bold', 'USAGE:')}
  sg-auditor [options]

${c('bold', 'OPTIONS:')}
  -g, --groups      Read a saved "aws ec2 describe-security-groups" JSON dump
  -n, --dry-run     Print the report instead of emailing it
  -j, --json        Output the audit result as JSON
  -h, --help        Show this help
  -v, --version     Show the version

${c('bold', 'ENVIRONMENT:')}
  SES_SENDER        Verified SES sender address (required unless --dry-run)
  SES_RECIPIENT     Report recipient address (required unless --dry-run)
  AWS_REGION        AWS region (default: ${DEFAULT_REGION})
  AWS_PROFILE       Named AWS profile for credentials

${c('bold', 'EXIT CODES:')}
  0    Audit completed
  1    Configuration, collection or dispatch failure
`);
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  if (options.version) {
    console.log(`sg-auditor v${VERSION}`);
    return;
  }
  if (options.help) {
    showHelp();
    return;
  }

  if (options.json) {
    // Progress logs go to stderr; stdout is the JSON document alone
    const run = await withLogsOnStderr(async () => buildPipeline(options).execute());
    console.log(JSON.stringify(toJSONSummary(run), null, 2));
    return;
  }

  displayRun(await buildPipeline(options).execute(), options.dryRun);
}

main().catch((err) => {
  console.error(c('red', 'Error:'), err instanceof Error ? err.message : String(err));
  process.exit(1);
});
