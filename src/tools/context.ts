// src/tools/context.ts

import type { EngineConfig } from '../config.js';
import type { RequestClassifier } from '../decision/index.js';
import type { HookManager } from '../hooks/index.js';
import type { RiskClassifier } from '../risk/index.js';
import type { SessionStore } from '../session/index.js';
import { errorMessage } from '../errors.js';

/**
 * Engine components the MCP tools read from. An `Orchestrator` satisfies
 * this shape.
 */
export interface EngineContext {
  config: EngineConfig;
  classifier: RequestClassifier;
  riskClassifier: RiskClassifier;
  hooks: HookManager;
  store: SessionStore;
}

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: 'text', text }] };
}

export function errorResponse(error: unknown): ToolResponse {
  return {
    content: [{ type: 'text', text: `Error: ${errorMessage(error)}` }],
    isError: true
  };
}
