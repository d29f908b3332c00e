// src/hooks/builtin/mutation-monitor.ts

/**
 * Mutation Monitor Hook
 *
 * Counts resource mutations per workflow instance and flags writes to
 * sensitive paths.
 */

import type { HookDefinition, HookOutput } from '../types.js';
import { readNumber, readStringList } from '../../session/state.js';

const SENSITIVE_PATTERNS: RegExp[] = [
  /(^|\/)\.env(\.|$)/,
  /(^|\/)secrets?(\/|\.|$)/i,
  /\.(pem|key|p12)$/i,
  /(^|\/)migrations?\//i
];

export function mutationCountKey(instanceId: string): string {
  return `mutations:${instanceId}`;
}

export function mutatedResourcesKey(instanceId: string): string {
  return `mutatedResources:${instanceId}`;
}

export const mutationMonitorHook: HookDefinition<'onResourceMutated'> = {
  id: 'builtin:mutation-monitor',
  name: 'Mutation Monitor',
  description: 'Counts mutations per instance and flags sensitive paths',
  priority: 50,

  run: (context): HookOutput => {
    const countKey = mutationCountKey(context.instanceId);
    const resourcesKey = mutatedResourcesKey(context.instanceId);

    const resources = readStringList(context.state, resourcesKey);
    const findings = SENSITIVE_PATTERNS.some(pattern => pattern.test(context.resource))
      ? [`Sensitive resource modified: ${context.resource}`]
      : [];

    return {
      payload: { kind: 'mutation-check', resource: context.resource, findings },
      display: findings[0],
      statePatch: {
        [countKey]: readNumber(context.state, countKey) + 1,
        [resourcesKey]: resources.includes(context.resource) ? resources : [...resources, context.resource]
      }
    };
  }
};
