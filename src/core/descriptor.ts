/**
 * Capability descriptor resolution.
 *
 * Turns what a plugin's `describe()` returns into the frozen
 * CapabilityDescriptor the host negotiates against. Runs once, at
 * startup, before the listener binds: any problem here is a
 * ConfigurationError and the process never starts accepting calls.
 */

import type {
  CapabilityDescriptor,
  DescriptorInput,
  PluginMetadata,
  StageDeclaration,
} from '../types/descriptor.js';
import { DESCRIPTOR_JSON_SCHEMA } from '../types/descriptor-schema.js';
import { DEFAULT_FAILURE_POLICY, type FailurePolicy, type Stage } from '../types/protocol.js';
import { ConfigurationError, errorMessage } from './plugin-error.js';
import { STAGE_HANDLER_NAMES, formatErrorMessage, hasStageHandler, type Plugin } from './plugin.js';
import { SchemaValidator } from './schema-validator.js';

const validator = new SchemaValidator();
validator.compile('descriptor', DESCRIPTOR_JSON_SCHEMA);

// ---------------------------------------------------------------------------
// resolveDescriptor()
// ---------------------------------------------------------------------------

/**
 * Query the plugin for its descriptor and validate it.
 *
 * @throws ConfigurationError if `describe()` throws, the result fails
 *   the schema, a stage is declared twice, or a declared stage has no
 *   handler.
 */
export async function resolveDescriptor(plugin: Plugin): Promise<CapabilityDescriptor> {
  let input: DescriptorInput;
  try {
    input = await plugin.describe();
  } catch (error: unknown) {
    throw new ConfigurationError(`plugin describe() failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const result = validator.validate('descriptor', input);
  if (!result.valid) {
    throw new ConfigurationError(
      formatErrorMessage({
        component: 'descriptor',
        what: `invalid capability descriptor (${result.errors.join('; ')})`,
        how: 'return a name, a version and at least one of "request" or "response" from describe()',
      }),
    );
  }

  const defaultPolicy: FailurePolicy = input.failurePolicy ?? DEFAULT_FAILURE_POLICY;
  const seen = new Set<Stage>();
  const stages: StageDeclaration[] = [];

  for (const entry of input.stages) {
    const declaration: StageDeclaration =
      typeof entry === 'string'
        ? { stage: entry, failurePolicy: defaultPolicy }
        : { stage: entry.stage, failurePolicy: entry.failurePolicy ?? defaultPolicy };

    if (seen.has(declaration.stage)) {
      throw new ConfigurationError(`stage "${declaration.stage}" is declared more than once`, {
        field: 'stages',
      });
    }
    seen.add(declaration.stage);

    if (!hasStageHandler(plugin, declaration.stage)) {
      throw new ConfigurationError(
        formatErrorMessage({
          component: 'descriptor',
          what: `stage "${declaration.stage}" is declared but ${STAGE_HANDLER_NAMES[declaration.stage]}() is not implemented`,
          how: `implement ${STAGE_HANDLER_NAMES[declaration.stage]}() or remove the stage from describe()`,
        }),
        { field: 'stages' },
      );
    }

    stages.push(Object.freeze(declaration));
  }

  return Object.freeze({
    name: input.name,
    version: input.version,
    description: input.description ?? '',
    stages: Object.freeze(stages),
  });
}

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

/** The declaration for a stage, or undefined when the plugin didn't declare it. */
export function findStage(
  descriptor: CapabilityDescriptor,
  stage: Stage,
): StageDeclaration | undefined {
  return descriptor.stages.find((declaration) => declaration.stage === stage);
}

/** Identity fields only, as served by GetMetadata. */
export function toMetadata(descriptor: CapabilityDescriptor): PluginMetadata {
  return {
    name: descriptor.name,
    version: descriptor.version,
    description: descriptor.description,
  };
}
