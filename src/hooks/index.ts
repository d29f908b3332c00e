// src/hooks/index.ts

export { HookManager } from './manager.js';
export { LIFECYCLE_POINTS } from './types.js';
export type {
  DispatchReport,
  HookContextMap,
  HookDefinition,
  HookOutput,
  HookPayload,
  HookResult,
  HookStats,
  HookStatus,
  LifecyclePoint,
  OnRequestSubmitContext,
  OnResourceMutatedContext,
  OnWorkflowStopContext
} from './types.js';
export {
  registerBuiltinHooks,
  keywordDetectorHook,
  detectModes,
  mutationMonitorHook,
  mutationCountKey,
  mutatedResourcesKey,
  completionGuardHook
} from './builtin/index.js';
export type { RequestMode } from './builtin/index.js';
