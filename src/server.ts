#!/usr/bin/env node
// src/server.ts

/**
 * MCP server exposing classification, risk, hook and session tools over
 * stdio. Workflows themselves run in-process through `Orchestrator`.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { config } from './config.js';
import { RequestClassifier } from './decision/index.js';
import { errorMessage } from './errors.js';
import { HookManager, registerBuiltinHooks } from './hooks/index.js';
import { RiskClassifier } from './risk/index.js';
import { loadClassificationRules } from './rules/index.js';
import { SessionStore } from './session/index.js';
import { registerAllTools, EngineContext } from './tools/index.js';
import { logger } from './utils/logger.js';

export function createEngineContext(): EngineContext {
  const rules = loadClassificationRules(config.rulesFile);
  const hooks = new HookManager(config.hooks);
  registerBuiltinHooks(hooks);

  return {
    config,
    classifier: new RequestClassifier({ rules, config: config.decision }),
    riskClassifier: new RiskClassifier(rules),
    hooks,
    store: new SessionStore()
  };
}

async function main(): Promise<void> {
  const server = new McpServer({ name: 'swarmflow', version: '0.1.0' });
  registerAllTools(server, createEngineContext());

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('swarmflow MCP server listening on stdio');
}

main().catch(error => {
  logger.fatal({ error: errorMessage(error) }, 'Server failed to start');
  process.exit(1);
});
