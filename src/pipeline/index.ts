// Audit Pipeline - list security groups, collect violations, email the report
// Collaborators are injected; nothing here reads the environment.

import { summarizeAudit } from '../auditor/rule-collector.js';
import {
  Ec2SecurityGroupSource,
  createEC2Client,
  type SecurityGroupSource,
} from '../integrations/aws-scanner.js';
import {
  ReportDispatcher,
  SesMailSender,
  createSESClient,
} from '../integrations/notifications.js';
import type { AuditConfig, AuditResponse, AuditResult, DispatchOutcome } from '../types/audit.js';

export interface AuditDependencies {
  source: SecurityGroupSource;
  dispatcher: ReportDispatcher;
  config: Pick<AuditConfig, 'sender' | 'recipient'>;
}

export interface AuditRun {
  result: AuditResult;
  dispatch: DispatchOutcome;
  response: AuditResponse;
}

export function summaryMessage(count: number): string {
  return `Audit complete. ${count} insecure rules found.`;
}

export class AuditPipeline {
  private deps: AuditDependencies;

  constructor(deps: AuditDependencies) {
    this.deps = deps;
  }

  /**
   * Runs one audit. Collection and dispatch failures propagate unchanged.
   */
  async execute(): Promise<AuditRun> {
    const { source, dispatcher, config } = this.deps;

    console.log('[AUDIT] Starting security group audit');

    const groups = await source.listSecurityGroups();
    const result = summarizeAudit(groups);
    console.log(`[AUDIT] ${groups.length} groups checked, ${result.count} insecure rules`);

    const dispatch = await dispatcher.sendReport(result.violations, config.sender, config.recipient);

    return {
      result,
      dispatch,
      response: { statusCode: 200, body: summaryMessage(result.count) },
    };
  }

  async run(): Promise<AuditResponse> {
    const { response } = await this.execute();
    console.log(`[AUDIT] ${response.body}`);
    return response;
  }
}

export async function runAudit(deps: AuditDependencies): Promise<AuditResponse> {
  return new AuditPipeline(deps).run();
}

/**
 * Builds the AWS-backed pipeline. The EC2 and SES clients live as long as
 * the returned pipeline.
 */
export function createAuditPipeline(
  config: AuditConfig,
  source: SecurityGroupSource = new Ec2SecurityGroupSource(createEC2Client(config))
): AuditPipeline {
  return new AuditPipeline({
    source,
    dispatcher: new ReportDispatcher(new SesMailSender(createSESClient(config))),
    config,
  });
}

// Scheduled or manual trigger; the event payload is not used
export function createAuditHandler(pipeline: AuditPipeline): (event?: unknown) => Promise<AuditResponse> {
  return async () => pipeline.run();
}
