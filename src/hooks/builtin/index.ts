// src/hooks/builtin/index.ts

/**
 * Built-in Hooks Index
 */

import type { HookManager } from '../manager.js';
import { keywordDetectorHook } from './keyword-detector.js';
import { mutationMonitorHook } from './mutation-monitor.js';
import { completionGuardHook } from './completion-guard.js';

export { keywordDetectorHook, detectModes } from './keyword-detector.js';
export type { RequestMode } from './keyword-detector.js';
export { mutationMonitorHook, mutationCountKey, mutatedResourcesKey } from './mutation-monitor.js';
export { completionGuardHook } from './completion-guard.js';

export function registerBuiltinHooks(manager: HookManager): void {
  manager.register('onRequestSubmit', keywordDetectorHook);
  manager.register('onResourceMutated', mutationMonitorHook);
  manager.register('onWorkflowStop', completionGuardHook);
}
