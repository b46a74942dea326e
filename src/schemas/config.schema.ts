// Strict JSON Schema for auditor configuration

export const auditConfigSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['sender', 'recipient', 'region'],
  additionalProperties: false,
  properties: {
    sender: { type: 'string', format: 'email' },
    recipient: { type: 'string', format: 'email' },
    region: { type: 'string', pattern: '^[a-z]{2}(-[a-z]+)+-\\d+$' },
    profile: { type: 'string', minLength: 1 }
  }
} as const;
