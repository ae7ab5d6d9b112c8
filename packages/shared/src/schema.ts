export const packageManifestSchema = {
  type: 'object',
  required: ['name', 'version'],
  properties: {
    name: {
      type: 'string',
      pattern: '^[a-z][a-z0-9_]*$',
    },
    version: {
      type: 'string',
      pattern: '^\\d+\\.\\d+\\.\\d+',
    },
    description: { type: 'string' },
    dependencies: {
      type: 'array',
      items: { type: 'string' },
    },
  },
  additionalProperties: false,
} as const

export const workspaceConfigSchema = {
  type: 'object',
  properties: {
    packagePath: {
      type: 'array',
      items: { type: 'string', minLength: 1 },
    },
    basePackage: {
      type: 'string',
      pattern: '^[a-z][a-z0-9_]*$',
    },
    packages: {
      type: 'object',
      additionalProperties: { type: 'string', minLength: 1 },
    },
  },
  additionalProperties: false,
} as const
