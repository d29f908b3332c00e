// src/hooks/builtin/completion-guard.ts

/**
 * Completion Guard Hook
 *
 * Blocks workflow stop while deferred or dropped tasks have not been
 * acknowledged by an operator.
 */

import type { HookDefinition, HookOutput } from '../types.js';
import { createComponentLogger } from '../../utils/logger.js';

const log = createComponentLogger('hooks:completion-guard');

export const completionGuardHook: HookDefinition<'onWorkflowStop'> = {
  id: 'builtin:completion-guard',
  name: 'Completion Guard',
  description: 'Refuses stop while deferred or dropped tasks are unacknowledged',
  priority: 5,
  blocking: true,

  run: (context): HookOutput => {
    const acknowledged = new Set(context.acknowledgedTasks);
    const pending = [...context.deferredTasks, ...context.droppedTasks]
      .filter(taskId => !acknowledged.has(taskId));

    if (pending.length === 0) {
      return { payload: { kind: 'stop-gate', allowStop: true, warnings: [] } };
    }

    log.warn({ instanceId: context.instanceId, pending }, 'Workflow stopping with unfinished tasks');

    const warnings = pending.map(taskId => `Task ${taskId} was not executed`);
    return {
      payload: { kind: 'stop-gate', allowStop: false, warnings },
      display: `${pending.length} task(s) were deferred or dropped and need acknowledgment`
    };
  }
};
