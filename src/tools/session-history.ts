// src/tools/session-history.ts

/**
 * Session Tools
 *
 * Read access to workflow records and explicit checkpoint / restore of the
 * session store.
 */

import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SessionRecord } from '../session/index.js';
import { EngineContext, ToolResponse, errorResponse, textResponse } from './context.js';

export const sessionHistorySchema = z.object({
  request_id: z.string().optional().describe('Show one request with its transitions'),
  limit: z.number().int().positive().default(20).describe('Max records to list')
});

export const sessionCheckpointSchema = z.object({
  action: z.enum(['save', 'restore']),
  path: z.string().describe('Checkpoint file path')
});

function formatRecord(record: SessionRecord): string {
  let output = `## ${record.requestId}\n\n`;
  output += `**Description:** ${record.description}\n`;
  output += `**Instance:** ${record.instanceId}\n`;
  output += `**Plan:** ${record.plan} | **Tier:** ${record.tier} | **Status:** ${record.status}\n`;
  output += `**Aggregate:** ${record.aggregate}\n\n`;

  output += `### Transitions\n`;
  for (const transition of record.history) {
    const scope = transition.phase ? ` [${transition.phase}]` : '';
    const detail = transition.detail ? ` (${transition.detail})` : '';
    output += `- ${transition.from} → ${transition.to} on ${transition.event}${scope}${detail}\n`;
  }
  return output;
}

export function handleSessionHistory(
  engine: EngineContext,
  params: z.input<typeof sessionHistorySchema>
): ToolResponse {
  const { request_id, limit } = sessionHistorySchema.parse(params);

  if (request_id) {
    const record = engine.store.get(request_id);
    return record
      ? textResponse(formatRecord(record))
      : errorResponse(new Error(`Unknown request: ${request_id}`));
  }

  const records = engine.store.list().slice(-limit);
  if (records.length === 0) {
    return textResponse('No workflow records in this session.');
  }

  let output = `| Request | Plan | Tier | Status | Aggregate |\n|---------|------|------|--------|-----------|\n`;
  output += records
    .map(record => `| ${record.requestId} | ${record.plan} | ${record.tier} | ${record.status} | ${record.aggregate} |`)
    .join('\n');
  return textResponse(output);
}

export function handleSessionCheckpoint(
  engine: EngineContext,
  params: z.input<typeof sessionCheckpointSchema>
): ToolResponse {
  const { action, path } = sessionCheckpointSchema.parse(params);
  const ok = action === 'save' ? engine.store.checkpoint(path) : engine.store.restore(path);
  return ok
    ? textResponse(`Session ${action === 'save' ? 'saved to' : 'restored from'} ${path}.`)
    : errorResponse(new Error(`Session ${action} failed for ${path}`));
}

export function registerSessionTools(server: McpServer, engine: EngineContext): void {
  server.tool(
    'session_history',
    'List workflow records of this session or show one with its transitions',
    sessionHistorySchema.shape,
    async params => handleSessionHistory(engine, params)
  );

  server.tool(
    'session_checkpoint',
    'Save the session store to a JSON file or restore it from one',
    sessionCheckpointSchema.shape,
    async params => handleSessionCheckpoint(engine, params)
  );
}
