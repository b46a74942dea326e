// Integration Hub - AWS collaborators and configuration for the auditor
// Supports: EC2 security group listing, saved describe-security-groups dumps, SES email

export {
  Ec2SecurityGroupSource,
  FileSecurityGroupSource,
  CollectionError,
  createEC2Client,
  toSecurityGroup,
} from './aws-scanner.js';
export type { SecurityGroupSource, AWSClientConfig } from './aws-scanner.js';
export { ConfigLoader, ConfigurationError, DEFAULT_REGION } from './config.js';
export {
  ReportDispatcher,
  SesMailSender,
  DispatchError,
  createSESClient,
  formatReport,
  REPORT_HEADER,
  REPORT_SUBJECT,
} from './notifications.js';
export type { MailMessage, MailSender, EmailApi } from './notifications.js';
