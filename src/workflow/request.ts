// src/workflow/request.ts

/**
 * Request intake: validates raw submissions into immutable TaskRequests.
 */

import crypto from 'crypto';
import { z } from 'zod';
import { InvalidRequestError } from '../errors.js';
import type { TaskRequest } from '../types.js';
import { createComponentLogger } from '../utils/logger.js';

const log = createComponentLogger('workflow:request');

const nonNegative = z.number().finite().transform(value => Math.max(0, value));

export const submissionSchema = z.object({
  id: z.string().min(1).optional(),
  description: z.string().refine(value => value.trim().length > 0, {
    message: 'Description must not be empty'
  }),
  fileHints: z.array(z.string().min(1)).default([]),
  session: z.object({
    priorPatterns: z.array(z.string()).default([]),
    recentFiles: z.array(z.string()).default([]),
    currentTokens: nonNegative.default(0),
    loadedFiles: nonNegative.default(0)
  }).default({}),
  riskFlags: z.object({
    irreversible: z.boolean().optional(),
    regulatedData: z.boolean().optional(),
    securityOrPrivacy: z.boolean().optional(),
    dataIntegrity: z.boolean().optional(),
    userVisible: z.boolean().optional()
  }).optional(),
  riskAssessment: z.object({
    failureScenario: z.string().optional(),
    detectionSignal: z.string().optional(),
    fastestRollback: z.string().optional(),
    weakestAssumption: z.string().optional()
  }).optional()
});

export type SubmissionInput = z.input<typeof submissionSchema>;

/**
 * @throws InvalidRequestError for a malformed or empty submission
 */
export function createRequest(input: unknown, maxDescriptionLength: number): TaskRequest {
  const parsed = submissionSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidRequestError(
      `Invalid request at ${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
  }

  const data = parsed.data;
  let description = data.description.trim();
  if (description.length > maxDescriptionLength) {
    log.warn({ length: description.length, max: maxDescriptionLength }, 'Description truncated');
    description = description.slice(0, maxDescriptionLength);
  }

  return Object.freeze({
    id: data.id ?? crypto.randomUUID(),
    description,
    fileHints: Object.freeze([...data.fileHints]),
    session: Object.freeze({
      priorPatterns: Object.freeze([...data.session.priorPatterns]),
      recentFiles: Object.freeze([...data.session.recentFiles]),
      currentTokens: data.session.currentTokens,
      loadedFiles: data.session.loadedFiles
    }),
    riskFlags: data.riskFlags,
    riskAssessment: data.riskAssessment,
    submittedAt: Date.now()
  });
}
