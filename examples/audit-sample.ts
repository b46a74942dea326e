// Sample script - audits a saved describe-security-groups dump without AWS access

import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { summarizeAudit } from '../src/auditor/rule-collector.js';
import { FileSecurityGroupSource, formatReport } from '../src/integrations/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const GROUPS_FILE = process.env.GROUPS_FILE ?? join(__dirname, 'sample-groups.json');

async function auditSample(): Promise<void> {
  const source = new FileSecurityGroupSource(GROUPS_FILE);
  const groups = await source.listSecurityGroups();
  const result = summarizeAudit(groups);

  console.log(`Checked ${groups.length} security groups\n`);
  console.log(formatReport(result.violations));
  console.log(`\n${result.count} insecure rules found`);
}

auditSample().catch((err) => {
  console.error(err);
  process.exit(1);
});
