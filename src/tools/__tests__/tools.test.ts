import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Orchestrator } from '../../workflow/index.js';
import {
  handleAssessRisk,
  handleClassifyRequest,
  handleHookStatus,
  handleHookToggle,
  handleSessionCheckpoint,
  handleSessionHistory
} from '../index.js';
import type { ToolResponse } from '../context.js';

function text(response: ToolResponse): string {
  return response.content.map(part => part.text).join('\n');
}

function engine(): Orchestrator {
  return new Orchestrator({ executor: async assignment => ({ summary: assignment.task.id }) });
}

describe('classification tools', () => {
  it('reports the plan and tier of a request', () => {
    const response = handleClassifyRequest(engine(), { description: 'fix typo in login page' });
    const lines = text(response).split('\n');

    expect(response.isError).toBeUndefined();
    expect(lines).toContain('**Plan:** direct (execute)');
    expect(lines).toContain('**Rule:** Simple Low-Risk Task');
    expect(lines).toContain('**Risk tier:** T0 (default)');
  });

  it('returns an error response for an empty description', () => {
    const response = handleClassifyRequest(engine(), { description: '  ' });

    expect(response.isError).toBe(true);
    expect(text(response).startsWith('Error: Invalid request')).toBe(true);
  });

  it('lists the assessment answers a T3 task still needs', () => {
    const response = handleAssessRisk(engine(), {
      description: 'rotate production signing credentials',
      fastest_rollback: 'reactivate the previous key version'
    });
    const lines = text(response).split('\n');

    expect(lines[0]).toBe('## Risk Tier T3');
    expect(lines).toContain('**Rule:** irreversible-or-regulated');
    expect(lines).toContain('**Approval:** human');
    expect(lines).toContain('Missing assessment answers: failureScenario, detectionSignal, weakestAssumption');
  });

  it('treats explicit flags like keywords', () => {
    const lines = text(handleAssessRisk(engine(), { description: 'adjust footer spacing', user_visible: true })).split('\n');

    expect(lines[0]).toBe('## Risk Tier T1');
    expect(lines).toContain('**Signals:** flag:userVisible');
  });
});

describe('hook tools', () => {
  it('groups hooks by lifecycle point with the point budget', () => {
    const orchestrator = engine();
    const output = text(handleHookStatus(orchestrator, {}));
    const budgets = orchestrator.config.hooks.budgets;

    expect(output).toContain(`### onRequestSubmit (budget ${budgets.onRequestSubmit}ms)`);
    expect(output).toContain(`### onWorkflowStop (budget ${budgets.onWorkflowStop}ms)`);
    expect(output).toContain('| builtin:completion-guard | 5 | yes | yes |');
  });

  it('disables a hook and hides it from the enabled-only listing', () => {
    const orchestrator = engine();

    expect(text(handleHookToggle(orchestrator, { hook_id: 'builtin:keyword-detector', enabled: false })))
      .toBe('Hook builtin:keyword-detector disabled.');
    expect(text(handleHookStatus(orchestrator, { include_disabled: false })))
      .not.toContain('builtin:keyword-detector');
    expect(text(handleHookStatus(orchestrator, { include_disabled: true })))
      .toContain('| builtin:keyword-detector | 10 | no |');
  });

  it('reports unknown hook ids', () => {
    const response = handleHookToggle(engine(), { hook_id: 'missing', enabled: true });

    expect(response.isError).toBe(true);
    expect(text(response)).toBe('Error: Hook not found: missing');
  });
});

describe('session tools', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'session-tools-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reports an empty session', () => {
    expect(text(handleSessionHistory(engine(), {}))).toBe('No workflow records in this session.');
  });

  it('lists finished workflows and shows one with its transitions', async () => {
    const orchestrator = engine();
    const submission = await orchestrator.submit({ id: 'req-1', description: 'fix typo in login page' });
    await submission.outcome;

    const table = text(handleSessionHistory(orchestrator, {})).split('\n');
    expect(table[2]).toBe('| req-1 | direct | T0 | AllPhasesCompleted | 1.2 |');

    const detail = text(handleSessionHistory(orchestrator, { request_id: 'req-1' })).split('\n');
    expect(detail[0]).toBe('## req-1');
    expect(detail).toContain('- NotStarted → Running on start');
    expect(detail).toContain('- pending → in_progress on start [execute]');
  });

  it('restores a saved session into another engine', async () => {
    const first = engine();
    const submission = await first.submit({ id: 'req-2', description: 'fix typo in signup page' });
    await submission.outcome;
    const path = join(dir, 'session.json');

    expect(text(handleSessionCheckpoint(first, { action: 'save', path }))).toBe(`Session saved to ${path}.`);

    const second = engine();
    expect(text(handleSessionCheckpoint(second, { action: 'restore', path }))).toBe(`Session restored from ${path}.`);
    expect(second.store.get('req-2')?.status).toBe('AllPhasesCompleted');
  });

  it('reports a missing checkpoint file', () => {
    const response = handleSessionCheckpoint(engine(), { action: 'restore', path: join(dir, 'absent.json') });

    expect(response.isError).toBe(true);
  });
});
