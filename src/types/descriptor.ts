/**
 * Capability descriptor types.
 *
 * A plugin declares its identity and the stages it handles once, at
 * startup. The host reads the resolved descriptor through the Describe,
 * GetMetadata and GetCapabilities calls and routes only the declared
 * stages to the plugin.
 */

import type { FailurePolicy, Stage } from './protocol.js';

// ---------------------------------------------------------------------------
// Author-facing input
// ---------------------------------------------------------------------------

/** A stage declaration with an explicit failure policy. */
export interface StageDeclarationInput {
  stage: Stage;
  failurePolicy?: FailurePolicy;
}

/**
 * What `Plugin.describe()` returns. Stages may be listed as bare names,
 * in which case they take `failurePolicy` (or fail-closed when unset).
 */
export interface DescriptorInput {
  name: string;
  version: string;
  description?: string;
  /** Plugin-wide default for stages that don't declare their own policy. */
  failurePolicy?: FailurePolicy;
  stages: Array<Stage | StageDeclarationInput>;
}

// ---------------------------------------------------------------------------
// Resolved descriptor
// ---------------------------------------------------------------------------

/** A declared stage with its resolved failure policy. */
export interface StageDeclaration {
  readonly stage: Stage;
  readonly failurePolicy: FailurePolicy;
}

/** Identifying metadata, as served by GetMetadata. */
export interface PluginMetadata {
  readonly name: string;
  readonly version: string;
  readonly description: string;
}

/**
 * The validated, frozen descriptor. Immutable for the process lifetime;
 * `stages` is never empty and never names a stage twice.
 */
export interface CapabilityDescriptor extends PluginMetadata {
  readonly stages: readonly StageDeclaration[];
}
