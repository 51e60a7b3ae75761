// public api for @quarry/sdk
// usage:
//   import { task, stageGraph, workflow, ref, zodSchema } from '@quarry/sdk';
//   task({ name: 'extract', input: zodSchema(z.object({})), run: async () => ({ value: 42 }) });

export * from './types';
export * from './errors';
export { ok, err, describeValue, zodSchema, anyValue } from './schema';
export type { Result, Schema, ValidationError, ValidationIssue } from './schema';
export { literal, ref, input, isReference, localReferences } from './params';
export { buildStageGraph, findCycle } from './graph/builder';
export type { TaskLookup } from './graph/builder';
export { buildWorkflow } from './graph/workflow-builder';
export type { StageGraphLookup } from './graph/workflow-builder';
export { DefinitionRegistry, globalRegistry, task, stageGraph, workflow } from './registry';
export { serialize, deserialize, clonePayload, SerializationError, DEFAULT_MAX_PAYLOAD_BYTES } from './utils/serialization';
