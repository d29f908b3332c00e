// src/tools/hook-status.ts

/**
 * Hook Tools
 *
 * Status and toggling of lifecycle hooks.
 */

import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { LIFECYCLE_POINTS, HookStats } from '../hooks/index.js';
import { EngineContext, ToolResponse, errorResponse, textResponse } from './context.js';

export const hookStatusSchema = z.object({
  include_disabled: z.boolean().default(true).describe('Include disabled hooks')
});

export const hookToggleSchema = z.object({
  hook_id: z.string().describe('Hook ID to enable/disable'),
  enabled: z.boolean().describe('Whether to enable or disable the hook')
});

function formatRow(stats: HookStats): string {
  const average = stats.calls > 0 ? Math.round(stats.totalDurationMs / stats.calls) : 0;
  return `| ${stats.hookId} | ${stats.priority} | ${stats.enabled ? 'yes' : 'no'} | ${stats.blocking ? 'yes' : 'no'} `
    + `| ${stats.calls} | ${stats.failures} | ${stats.timeouts} | ${stats.skipped} | ${average}ms |`;
}

export function handleHookStatus(
  engine: EngineContext,
  params: z.input<typeof hookStatusSchema>
): ToolResponse {
  const { include_disabled } = hookStatusSchema.parse(params);
  const stats = engine.hooks.getStats().filter(entry => include_disabled || entry.enabled);
  const budgets = engine.config.hooks.budgets;

  let output = `## Hook Status\n`;
  for (const point of LIFECYCLE_POINTS) {
    const rows = stats.filter(entry => entry.point === point);
    output += `\n### ${point} (budget ${budgets[point]}ms)\n\n`;
    if (rows.length === 0) {
      output += `No hooks registered.\n`;
      continue;
    }
    output += `| Hook | Priority | Enabled | Blocking | Calls | Failures | Timeouts | Skipped | Avg |\n`;
    output += `|------|----------|---------|----------|-------|----------|----------|---------|-----|\n`;
    output += rows.map(formatRow).join('\n') + '\n';
  }
  return textResponse(output);
}

export function handleHookToggle(
  engine: EngineContext,
  params: z.input<typeof hookToggleSchema>
): ToolResponse {
  const { hook_id, enabled } = hookToggleSchema.parse(params);
  if (!engine.hooks.setEnabled(hook_id, enabled)) {
    return errorResponse(new Error(`Hook not found: ${hook_id}`));
  }
  return textResponse(`Hook ${hook_id} ${enabled ? 'enabled' : 'disabled'}.`);
}

export function registerHookTools(server: McpServer, engine: EngineContext): void {
  server.tool(
    'hook_status',
    'List lifecycle hooks with their priority and execution statistics',
    hookStatusSchema.shape,
    async params => handleHookStatus(engine, params)
  );

  server.tool(
    'hook_toggle',
    'Enable or disable a lifecycle hook',
    hookToggleSchema.shape,
    async params => handleHookToggle(engine, params)
  );
}
