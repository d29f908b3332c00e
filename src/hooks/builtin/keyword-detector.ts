// src/hooks/builtin/keyword-detector.ts

/**
 * Keyword Detector Hook
 *
 * Tags incoming requests with execution modes and records them in session
 * state under `modes`.
 *
 * Modes:
 * - urgent: time-critical wording
 * - minimal: smallest possible change requested
 * - security: touches secrets, credentials or access control
 *
 * A security mode suggests escalating the request to at least T2.
 */

import type { RiskTier } from '../../types.js';
import type { HookDefinition, HookOutput, OnRequestSubmitContext } from '../types.js';
import { createComponentLogger } from '../../utils/logger.js';

const log = createComponentLogger('hooks:keyword-detector');

export type RequestMode = 'urgent' | 'minimal' | 'security';

interface ModeDefinition {
  mode: RequestMode;
  patterns: RegExp[];
  suggestedTier?: RiskTier;
}

const MODES: ModeDefinition[] = [
  {
    mode: 'urgent',
    patterns: [/\burgent\b/i, /\basap\b/i, /\bimmediately\b/i, /\bemergency\b/i, /\bhotfix\b/i]
  },
  {
    mode: 'minimal',
    patterns: [/\bminimal\b/i, /\btypo\b/i, /\bone-line\b/i, /\btiny\b/i]
  },
  {
    mode: 'security',
    patterns: [/\bsecurity\b/i, /\bcredentials?\b/i, /\bsecrets?\b/i, /\bvulnerab/i, /\bpermissions?\b/i],
    suggestedTier: 'T2'
  }
];

export function detectModes(text: string): ModeDefinition[] {
  return MODES.filter(definition => definition.patterns.some(pattern => pattern.test(text)));
}

export const keywordDetectorHook: HookDefinition<'onRequestSubmit'> = {
  id: 'builtin:keyword-detector',
  name: 'Keyword Detector',
  description: 'Tags requests with detected execution modes',
  priority: 10,
  timeoutMs: 100,

  shouldRun: (context: OnRequestSubmitContext) => context.request.description.trim().length > 0,

  run: (context): HookOutput => {
    const detected = detectModes(context.request.description);
    if (detected.length === 0) {
      return { payload: { kind: 'request-annotation', tags: [] } };
    }

    const tags = detected.map(definition => definition.mode);
    const suggestedTier = detected.find(definition => definition.suggestedTier)?.suggestedTier;

    log.debug({ requestId: context.request.id, tags }, 'Modes detected');

    return {
      payload: { kind: 'request-annotation', tags, suggestedTier },
      display: `Detected modes: ${tags.join(', ')}`,
      statePatch: { modes: tags }
    };
  }
};
