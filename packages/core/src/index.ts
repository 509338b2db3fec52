/**
 * @curvelink/core - keeps tessellated meshes in sync with parametric curves
 *
 * ## Primary API
 * - MeshSyncEngine: lifecycle, change handlers, update/forget operations
 * - linkMeshCopy / updateNow / unlink: commands for a host UI
 *
 * ## Building blocks
 * - fingerprint: deterministic digest of shape-relevant source state
 * - link: Link record schema and the target registry
 * - sync: change detector, debounce scheduler, event router
 * - artifact: build (with placement normalization) and swap
 * - host: the ports a host application implements
 */

// =============================================================================
// Engine & commands
// =============================================================================
export { MeshSyncEngine, type MeshSyncEngineOptions, type UpdateOptions } from './sync/engine.js';
export { linkMeshCopy, updateNow, unlink, type CommandResult } from './commands.js';
export {
  ConfigError,
  SyncConfigSchema,
  resolveSyncConfig,
  type SyncConfig,
  type SyncConfigInput,
} from './config.js';
export {
  failuresOf,
  type FailureStage,
  type SyncFailure,
  type TargetOutcome,
  type UpdateReport,
} from './sync/types.js';

// =============================================================================
// Host ports
// =============================================================================
export {
  isSourceObject,
  isTargetObject,
  type EmptyObject,
  type EvaluateOptions,
  type EvaluationService,
  type InteractionMode,
  type MaterialSlot,
  type NewMeshObject,
  type ResourceStore,
  type SceneEventBus,
  type SceneGraph,
  type SceneObject,
  type SourceObject,
  type SyncHost,
  type TargetObject,
  type TimerCallback,
  type TimerFacility,
  type Unsubscribe,
  type UpdateBatch,
  type UpdateEntry,
} from './host/types.js';
export { createNodeTimers, type NodeTimerFacility } from './sync/timers.js';

// =============================================================================
// Data model
// =============================================================================
export * from './source/types.js';
export {
  DEFAULT_DEBOUNCE,
  LinkSchema,
  SourceRefSchema,
  clampDebounce,
  createLink,
  type Link,
  type LinkInput,
  type SourceRef,
} from './link/schema.js';
export { createMesh, createEmptyMesh, translateMesh, type MeshArtifact } from './mesh/types.js';
export {
  vec3,
  add3,
  sub3,
  mul3,
  cross3,
  length3,
  normalize3,
  lerp3,
  projectHomogeneous,
  type Vec3,
  type Vec4,
} from './num/vec3.js';
export { identity4, copy4, translation4, scale4, mul4, transformPoint3, invertAffine4, type Mat4 } from './num/mat4.js';

// =============================================================================
// Building blocks
// =============================================================================
export { fingerprint } from './fingerprint/fingerprint.js';
export {
  DEFAULT_MODIFIER_SCHEMA,
  createModifierSchemaTable,
  type ModifierSchemaTable,
  type ParamKind,
  type ParamSpec,
} from './fingerprint/modifierSchema.js';
export { resolveSourceRef, sourceRefOf, sourcesUsingCurve, targetsFor, type TargetQuery } from './link/registry.js';
export { ChangeDetector } from './sync/changeDetector.js';
export { DebounceScheduler, type PendingTask, type ScheduleOptions } from './sync/scheduler.js';
export { EventRouter } from './sync/router.js';
export { SyncState } from './sync/state.js';
export { buildArtifact, normalizePlacement, placementAnchor } from './artifact/build.js';
export { swapArtifact, type SwapResult } from './artifact/swap.js';
