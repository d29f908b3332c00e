// src/tools/classify-request.ts

/**
 * Classification Tools
 *
 * `classify_request` scores a request and reports the chosen workflow plan;
 * `assess_risk` reports the risk tier and which assessment answers are
 * still missing. Neither starts a workflow.
 */

import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { DIMENSIONS, Classification } from '../decision/index.js';
import { missingAssessmentFields } from '../risk/index.js';
import { createRequest } from '../workflow/request.js';
import { errorMessage } from '../errors.js';
import { createComponentLogger } from '../utils/logger.js';
import { EngineContext, ToolResponse, errorResponse, textResponse } from './context.js';

const log = createComponentLogger('tools');

const flagShape = {
  irreversible: z.boolean().optional().describe('Task cannot be undone'),
  regulated_data: z.boolean().optional().describe('Task touches regulated data'),
  security: z.boolean().optional().describe('Task affects security or privacy'),
  data_integrity: z.boolean().optional().describe('Task can corrupt stored data'),
  user_visible: z.boolean().optional().describe('Task changes user-visible behavior')
};

export const classifyRequestSchema = z.object({
  description: z.string().describe('Natural-language task description'),
  file_hints: z.array(z.string()).default([]).describe('Files or directories the task is expected to touch'),
  ...flagShape
});

export const assessRiskSchema = z.object({
  description: z.string().describe('Task description'),
  resources: z.array(z.string()).default([]).describe('Resources the task mutates'),
  failure_scenario: z.string().optional(),
  detection_signal: z.string().optional(),
  fastest_rollback: z.string().optional(),
  weakest_assumption: z.string().optional(),
  ...flagShape
});

type FlagParams = { [K in keyof typeof flagShape]?: boolean };

function toFlags(params: FlagParams) {
  return {
    irreversible: params.irreversible,
    regulatedData: params.regulated_data,
    securityOrPrivacy: params.security,
    dataIntegrity: params.data_integrity,
    userVisible: params.user_visible
  };
}

export function formatClassification(classification: Classification): string {
  const { score, plan, risk } = classification;

  let output = `## Classification\n\n`;
  output += `**Plan:** ${plan.kind} (${plan.phases.map(phase => phase.name).join(' → ')})\n`;
  output += `**Rule:** ${classification.rule}\n`;
  output += `**Confidence:** ${classification.confidence}\n`;
  output += `**Risk tier:** ${risk.tier} (${risk.rule})\n`;
  output += `**Aggregate:** ${score.aggregate}\n\n`;

  output += `| Dimension | Score | Level |\n|-----------|-------|-------|\n`;
  for (const dimension of DIMENSIONS) {
    output += `| ${dimension} | ${score.dimensions[dimension]} | ${score.levels[dimension]} |\n`;
  }

  if (classification.decisionFactors.length > 0) {
    output += `\n### Factors\n`;
    output += classification.decisionFactors.map(factor => `- ${factor}`).join('\n') + '\n';
  }

  if (classification.alternatives.length > 0) {
    output += `\n### Alternatives\n`;
    output += classification.alternatives
      .map(alternative => `- ${alternative.kind}: ${alternative.suitability}`)
      .join('\n') + '\n';
  }

  return output;
}

export function handleClassifyRequest(
  engine: EngineContext,
  params: z.input<typeof classifyRequestSchema>
): ToolResponse {
  try {
    const parsed = classifyRequestSchema.parse(params);
    const request = createRequest({
      description: parsed.description,
      fileHints: parsed.file_hints,
      riskFlags: toFlags(parsed)
    }, engine.config.workflow.maxDescriptionLength);

    return textResponse(formatClassification(engine.classifier.classify(request)));
  } catch (error) {
    log.warn({ tool: 'classify_request', error: errorMessage(error) }, 'Tool call failed');
    return errorResponse(error);
  }
}

export function handleAssessRisk(
  engine: EngineContext,
  params: z.input<typeof assessRiskSchema>
): ToolResponse {
  try {
    const parsed = assessRiskSchema.parse(params);
    const decision = engine.riskClassifier.determine({
      description: parsed.description,
      resources: parsed.resources,
      flags: toFlags(parsed)
    });
    const missing = missingAssessmentFields(decision.tier, {
      failureScenario: parsed.failure_scenario,
      detectionSignal: parsed.detection_signal,
      fastestRollback: parsed.fastest_rollback,
      weakestAssumption: parsed.weakest_assumption
    });

    let output = `## Risk Tier ${decision.tier}\n\n`;
    output += `**Rule:** ${decision.rule}\n`;
    output += `**Signals:** ${decision.signals.length > 0 ? decision.signals.join(', ') : 'none'}\n`;
    output += `**Review:** ${decision.controls.review}\n`;
    output += `**Verification:** ${decision.controls.verification}\n`;
    output += `**Approval:** ${decision.controls.approval}\n\n`;
    output += missing.length > 0
      ? `Missing assessment answers: ${missing.join(', ')}\n`
      : `Ready for execution.\n`;

    return textResponse(output);
  } catch (error) {
    return errorResponse(error);
  }
}

export function registerClassificationTools(server: McpServer, engine: EngineContext): void {
  server.tool(
    'classify_request',
    'Score a task request and report the workflow plan it would run under',
    classifyRequestSchema.shape,
    async params => handleClassifyRequest(engine, params)
  );

  server.tool(
    'assess_risk',
    'Determine the risk tier of a task and the assessment answers it still needs',
    assessRiskSchema.shape,
    async params => handleAssessRisk(engine, params)
  );
}
