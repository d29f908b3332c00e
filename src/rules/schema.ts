// src/rules/schema.ts

import { z } from 'zod';

const weightTable = z.record(z.number());
const keywordList = z.array(z.string().min(1));

export const classificationRulesSchema = z.object({
  complexity: z.object({
    high: weightTable,
    medium: weightTable,
    low: weightTable
  }),
  risk: z.object({
    critical: weightTable,
    high: weightTable,
    medium: weightTable
  }),
  timePressure: z.object({
    indicators: weightTable,
    phrases: keywordList
  }),
  scope: z.object({
    global: keywordList,
    multiComponent: keywordList
  }),
  growth: keywordList,
  minimalism: weightTable,
  security: weightTable,
  reusability: weightTable,
  tiers: z.object({
    irreversible: keywordList,
    regulated: keywordList,
    security: keywordList,
    dataIntegrity: keywordList,
    userVisible: keywordList,
    multiModuleThreshold: z.number().int().min(2).default(2)
  })
});

export type ClassificationRules = z.output<typeof classificationRulesSchema>;
export type WeightTable = Record<string, number>;
