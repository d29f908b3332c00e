// src/tools/index.ts

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { EngineContext } from './context.js';
import { registerClassificationTools } from './classify-request.js';
import { registerHookTools } from './hook-status.js';
import { registerSessionTools } from './session-history.js';

export type { EngineContext, ToolResponse } from './context.js';
export {
  classifyRequestSchema, assessRiskSchema, formatClassification,
  handleClassifyRequest, handleAssessRisk, registerClassificationTools
} from './classify-request.js';
export {
  hookStatusSchema, hookToggleSchema,
  handleHookStatus, handleHookToggle, registerHookTools
} from './hook-status.js';
export {
  sessionHistorySchema, sessionCheckpointSchema,
  handleSessionHistory, handleSessionCheckpoint, registerSessionTools
} from './session-history.js';

export function registerAllTools(server: McpServer, engine: EngineContext): void {
  registerClassificationTools(server, engine);
  registerHookTools(server, engine);
  registerSessionTools(server, engine);
}
