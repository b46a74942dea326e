// JSON Schema for a DescribeSecurityGroups dump (aws ec2 describe-security-groups)
// Only the fields the auditor reads are constrained; everything else passes through.

const ipRangeSchema = {
  type: 'object',
  properties: {
    CidrIp: { type: 'string' },
    Description: { type: 'string' }
  }
} as const;

const ipPermissionSchema = {
  type: 'object',
  properties: {
    IpProtocol: { type: 'string' },
    FromPort: { type: 'integer' },
    ToPort: { type: 'integer' },
    IpRanges: { type: 'array', items: ipRangeSchema }
  }
} as const;

export const securityGroupsDumpSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['SecurityGroups'],
  properties: {
    SecurityGroups: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          GroupId: { type: 'string' },
          GroupName: { type: 'string' },
          IpPermissions: { type: 'array', items: ipPermissionSchema }
        }
      }
    }
  }
} as const;
