/**
 * @file Public API
 *
 * @module cairn
 */

// Fingerprinting
export { Parameters, PARAMETERS_BLACKLIST } from './dag/fingerprint/parameters.js';
export type { HashOverride, HashOverrides } from './dag/fingerprint/parameters.js';
export {
    combinedHash_compute,
    hashRepresentations_stringify,
    parameterSet_hash,
    parameterSet_hashDry,
} from './dag/fingerprint/hasher.js';
export type {
    HashAlgorithm,
    HashOptions,
    HashRepresentation,
    HashRepresentations,
    ParamsDump,
} from './dag/fingerprint/types.js';

// Cache
export { CacheGateway } from './dag/store/CacheGateway.js';
export type { CacheGatewayOptions } from './dag/store/CacheGateway.js';
export {
    Cacher,
    JsonCacher,
    RawCacher,
    ReferenceCacher,
    SerializedCacher,
    TableCacher,
    YamlCacher,
} from './dag/store/cachers.js';
export type { CacherKind, TableRow } from './dag/store/cachers.js';
export { FsBackend } from './dag/store/backend/fs.js';
export { MemoryBackend } from './dag/store/backend/memory.js';
export { lockfile_acquire, lock_with } from './dag/store/lock.js';
export { ParamsRegistry, RegistryStore, RunRegistry } from './dag/store/registry.js';
export type {
    ArtifactMetadata,
    CacheKey,
    CacherOptions,
    ParamsRegistryEntry,
    RunEntry,
    StorageBackend,
} from './dag/store/types.js';

// State and records
export { StateContainer } from './dag/state/StateContainer.js';
export type { ArtifactCell, SnapshotEntry } from './dag/state/StateContainer.js';
export { LazyHandle } from './dag/state/LazyHandle.js';
export { RunRecord } from './dag/record/RunRecord.js';
export type { RecordPathOptions } from './dag/record/RunRecord.js';

// Stages
export { Stage, stage_define, stageSchema_define } from './dag/stage/Stage.js';
export type { StageBody, StageInputs } from './dag/stage/Stage.js';
export { Aggregate, aggregate_define } from './dag/stage/Aggregate.js';
export type { AggregateBody, AggregateInputs } from './dag/stage/Aggregate.js';
export { Procedure } from './dag/stage/Procedure.js';
export type { ProcedureStep } from './dag/stage/Procedure.js';
export { lazy } from './dag/stage/types.js';
export type {
    AggregateDeclaration,
    StageDeclaration,
    StageInvocation,
    StageOutcome,
    StageState,
} from './dag/stage/types.js';

// Planning
export { RunContext } from './dag/run/RunContext.js';
export type { RunContextOptions, RunFailure, RunMode } from './dag/run/RunContext.js';
export { RunPlanner } from './dag/run/RunPlanner.js';
export type { Driver, RunOptions, RunResult } from './dag/run/RunPlanner.js';
export { paramSets_partition } from './dag/run/partition.js';
export { MemoryProvenance, ProvenanceBus } from './dag/run/provenance.js';
export type { ProvenanceEntry, ProvenanceSink } from './dag/run/provenance.js';
export { mustExecute_compute, plan_compute } from './dag/graph/planner.js';
export { executionOrder_compute, graph_validate } from './dag/graph/validator.js';
export type { ExecutionGraph, ExecutionPlan, GraphNode, StageIdentity } from './dag/graph/types.js';
export { plan_render } from './dag/visualizer/PlanRenderer.js';

// Settings, logging, errors
export { RunSettingsSchema, SettingsService } from './config/settings.js';
export type { RunSettings, RunSettingsInput } from './config/settings.js';
export { consoleSink_attach, Logger } from './logging/Logger.js';
export type { LogEvent, LogLevel } from './logging/Logger.js';
export * from './dag/errors.js';
