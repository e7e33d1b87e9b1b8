/**
 * Runtime JSON Schema that validates a DescriptorInput using ajv.
 *
 * Kept as a plain object (not a TypeScript type) so it can be fed
 * directly to `new Ajv().compile(DESCRIPTOR_JSON_SCHEMA)`.
 */

const failurePolicySchema = {
  type: 'string' as const,
  enum: ['fail-closed', 'fail-open'],
};

const stageNameSchema = {
  type: 'string' as const,
  enum: ['request', 'response'],
};

export const DESCRIPTOR_JSON_SCHEMA = {
  $id: 'urn:plugin-runtime:schemas:descriptor',
  type: 'object' as const,
  required: ['name', 'version', 'stages'],
  additionalProperties: false,

  properties: {
    name: { type: 'string', minLength: 1, pattern: '\\S' },
    version: { type: 'string', minLength: 1, pattern: '\\S' },
    description: { type: 'string' },
    failurePolicy: failurePolicySchema,
    stages: {
      type: 'array',
      minItems: 1,
      items: {
        oneOf: [
          stageNameSchema,
          {
            type: 'object',
            required: ['stage'],
            additionalProperties: false,
            properties: {
              stage: stageNameSchema,
              failurePolicy: failurePolicySchema,
            },
          },
        ],
      },
    },
  },
};
