import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ResourceOverlapError, ResourceOwnershipError } from '../../errors.js';
import { AgentSwarmCoordinator } from '../coordinator.js';
import { isDisjoint } from '../partition.js';
import type {
  AgentTask,
  ResourceMutation,
  SwarmEvent,
  VerificationRequest,
  WorkerExecutor
} from '../types.js';
import { executePhase, seededRandom, swarmConfig, task } from './helpers.js';

const never = () => new Promise<never>(() => {});

/**
 * Executor that writes every owned resource and reports success.
 */
const writeAll: WorkerExecutor = async (assignment, handle) => {
  for (const resource of assignment.task.resources) {
    await handle.recordMutation(resource);
  }
  return { summary: `done ${assignment.task.id}` };
};

function collect(coordinator: AgentSwarmCoordinator): SwarmEvent[] {
  const events: SwarmEvent[] = [];
  coordinator.onEvent(event => events.push(event));
  return events;
}

describe('AgentSwarmCoordinator', () => {
  it('keeps every worker inside its own resources across generated task sets', async () => {
    const random = seededRandom(42);
    const pool = Array.from({ length: 12 }, (_, i) => `dir${i % 4}/file${i}.ts`);

    for (let round = 0; round < 40; round++) {
      const count = 1 + Math.floor(random() * 6);
      const tasks: AgentTask[] = Array.from({ length: count }, (_, i) => {
        const resources = pool.filter(() => random() < 0.2);
        return task(`t${i}`, resources);
      });

      const mutations: ResourceMutation[] = [];
      const coordinator = new AgentSwarmCoordinator({
        executor: writeAll,
        config: swarmConfig({ maxConcurrentWorkers: 3 }),
        onMutation: async mutation => {
          mutations.push(mutation);
        }
      });

      if (!isDisjoint(tasks)) {
        await expect(coordinator.runPhase(executePhase, tasks)).rejects.toThrow(ResourceOverlapError);
        expect(mutations).toEqual([]);
        continue;
      }

      const result = await coordinator.runPhase(executePhase, tasks);
      const owners = new Map<string, string>();
      for (const outcome of result.outcomes) {
        for (const resource of outcome.modifiedResources) {
          expect(owners.has(resource)).toBe(false);
          owners.set(resource, outcome.taskId);
        }
      }
      for (const mutation of mutations) {
        const original = tasks.find(candidate => candidate.resources.includes(mutation.resource));
        expect(original).toBeDefined();
        expect(result.outcomes.find(outcome => outcome.taskId === original?.id)?.modifiedResources)
          .toContain(mutation.resource);
      }
      expect(result.completed).toHaveLength(count);
    }
  });

  it('rejects writes outside the owned resource set', async () => {
    let rejected: unknown;
    const coordinator = new AgentSwarmCoordinator({
      config: swarmConfig(),
      executor: async (_assignment, handle) => {
        await handle.recordMutation('src/a.ts');
        try {
          await handle.recordMutation('src/b.ts');
        } catch (error) {
          rejected = error;
        }
        return { summary: 'partial' };
      }
    });

    const result = await coordinator.runPhase(executePhase, [task('t1', ['src/a.ts'])]);
    expect(rejected).toBeInstanceOf(ResourceOwnershipError);
    expect(result.modifiedResources).toEqual(['src/a.ts']);
  });

  it('spawns fix workers only for tasks that failed verification', async () => {
    const calls: string[] = [];
    const verifications: VerificationRequest[] = [];
    const coordinator = new AgentSwarmCoordinator({
      config: swarmConfig(),
      executor: async assignment => {
        calls.push(assignment.workerId);
        return { summary: `${assignment.kind} ${assignment.task.id}` };
      },
      verifier: request => {
        verifications.push(request);
        return Object.fromEntries(request.outcomes.map(outcome => [
          outcome.taskId,
          request.round === 1 && (outcome.taskId === 't2' || outcome.taskId === 't4')
            ? { passed: false, detail: 'lint errors', failingChecks: ['lint'] }
            : { passed: true }
        ]));
      }
    });
    const events = collect(coordinator);

    const tasks = ['a', 'b', 'c', 'd', 'e'].map((dir, i) => task(`t${i + 1}`, [`${dir}/index.ts`]));
    const result = await coordinator.runPhase(executePhase, tasks);

    expect(calls.filter(id => id.includes('~fix'))).toEqual(['execute:t2~fix1', 'execute:t4~fix1']);
    for (const id of ['t1', 't3', 't5']) {
      expect(calls.filter(call => call.startsWith(`execute:${id}`))).toEqual([`execute:${id}`]);
    }
    expect(verifications.map(request => request.outcomes.map(outcome => outcome.taskId))).toEqual([
      ['t1', 't2', 't3', 't4', 't5'],
      ['t2', 't4']
    ]);
    expect(verifications.map(request => request.verification)).toEqual(['basic', 'basic']);
    expect(result.completed).toEqual(['t1', 't2', 't3', 't4', 't5']);
    expect(result.fixWorkers).toBe(2);
    expect(result.workersSpawned).toBe(7);
    expect(events.filter(event => event.type === 'recovery:targeted-fix')).toEqual([
      { type: 'recovery:targeted-fix', phase: 'execute', taskIds: ['t2', 't4'] }
    ]);
  });

  it('passes the failure to the fix worker and escalates when it persists', async () => {
    const failures: Array<string | undefined> = [];
    const coordinator = new AgentSwarmCoordinator({
      config: swarmConfig(),
      executor: async assignment => {
        if (assignment.kind === 'fix') failures.push(assignment.failure?.detail);
        return { summary: 'attempted' };
      },
      verifier: request => Object.fromEntries(request.outcomes.map(outcome => [
        outcome.taskId,
        { passed: outcome.taskId !== 't1', detail: 'tests still red' }
      ]))
    });
    const events = collect(coordinator);

    const result = await coordinator.runPhase(executePhase, [task('t1', ['a/x.ts']), task('t2', ['b/x.ts'])]);

    expect(failures).toEqual(['tests still red']);
    expect(result.failed).toEqual(['t1']);
    expect(result.completed).toEqual(['t2']);
    expect(events.filter(event => event.type === 'task:escalated')).toEqual([
      { type: 'task:escalated', phase: 'execute', taskId: 't1', detail: 'tests still red' }
    ]);
    expect(result.errors.filter(entry => entry.code === 'VERIFICATION_FAILURE')).toHaveLength(2);
  });

  it('fails every candidate when the verifier throws', async () => {
    const coordinator = new AgentSwarmCoordinator({
      config: swarmConfig({ maxFixAttempts: 0 }),
      executor: writeAll,
      verifier: () => {
        throw new Error('verifier offline');
      }
    });

    const result = await coordinator.runPhase(executePhase, [task('t1', ['a/x.ts'])]);
    expect(result.failed).toEqual(['t1']);
    expect(result.outcomes[0].verification).toEqual({ passed: false, detail: 'Verifier failed: verifier offline' });
  });

  it('treats a worker reporting failure as a failed task without asking the verifier', async () => {
    const verified: string[] = [];
    const coordinator = new AgentSwarmCoordinator({
      config: swarmConfig({ maxFixAttempts: 0 }),
      executor: async assignment => assignment.task.id === 't1'
        ? { summary: 'could not apply', success: false, error: 'merge conflict' }
        : { summary: 'ok' },
      verifier: request => {
        verified.push(...request.outcomes.map(outcome => outcome.taskId));
        return Object.fromEntries(request.outcomes.map(outcome => [outcome.taskId, { passed: true }]));
      }
    });

    const result = await coordinator.runPhase(executePhase, [task('t1', ['a/x.ts']), task('t2', ['b/x.ts'])]);
    expect(verified).toEqual(['t2']);
    expect(result.failed).toEqual(['t1']);
    expect(result.outcomes.find(outcome => outcome.taskId === 't1')?.error).toBe('merge conflict');
  });

  it('reports original tasks for merged units', async () => {
    const coordinator = new AgentSwarmCoordinator({
      config: swarmConfig({ maxConcurrentWorkers: 1 }),
      executor: writeAll
    });

    const result = await coordinator.runPhase(executePhase, [
      task('t1', ['src/a.ts']),
      task('t2', ['src/b.ts'])
    ]);

    expect(result.outcomes.map(outcome => [outcome.taskId, outcome.mergedInto, outcome.modifiedResources])).toEqual([
      ['t1', 'merged:t1+t2', ['src/a.ts']],
      ['t2', 'merged:t1+t2', ['src/b.ts']]
    ]);
    expect(result.completed).toEqual(['t1', 't2']);
    expect(result.workersSpawned).toBe(1);
  });

  it('verifies merged work per task and fixes only the failing sibling', async () => {
    const calls: string[] = [];
    const fixResources: string[][] = [];
    const verifications: VerificationRequest[] = [];
    const coordinator = new AgentSwarmCoordinator({
      config: swarmConfig({ maxConcurrentWorkers: 1 }),
      executor: async (assignment, handle) => {
        calls.push(assignment.workerId);
        if (assignment.kind === 'fix') fixResources.push([...assignment.task.resources]);
        for (const resource of assignment.task.resources) {
          await handle.recordMutation(resource);
        }
        return { summary: `${assignment.kind} ${assignment.task.id}` };
      },
      verifier: request => {
        verifications.push(request);
        return Object.fromEntries(request.outcomes.map(outcome => [
          outcome.taskId,
          request.round === 1 && outcome.taskId === 't2'
            ? { passed: false, detail: 'type errors' }
            : { passed: true }
        ]));
      }
    });

    const result = await coordinator.runPhase(executePhase, [
      task('t1', ['src/a.ts']),
      task('t2', ['src/b.ts'])
    ]);

    expect(verifications.map(request => request.outcomes.map(outcome => outcome.taskId))).toEqual([
      ['t1', 't2'],
      ['t2']
    ]);
    expect(calls).toEqual(['execute:merged:t1+t2', 'execute:t2~fix1']);
    expect(fixResources).toEqual([['src/b.ts']]);
    expect(result.completed).toEqual(['t1', 't2']);
    expect(result.outcomes.map(outcome => [outcome.taskId, outcome.fixAttempts, outcome.workerId])).toEqual([
      ['t1', 0, 'execute:merged:t1+t2'],
      ['t2', 1, 'execute:t2~fix1']
    ]);
    expect(result.workersSpawned).toBe(2);
  });

  it('defers non-critical tasks when a later phase can take them', async () => {
    const coordinator = new AgentSwarmCoordinator({
      config: swarmConfig({ maxConcurrentWorkers: 1 }),
      executor: writeAll
    });
    const events = collect(coordinator);

    const result = await coordinator.runPhase(
      executePhase,
      [task('t1', ['a/x.ts'], { critical: true }), task('t2', ['b/x.ts'])],
      { allowDefer: true }
    );

    expect(result.completed).toEqual(['t1']);
    expect(result.deferred.map(unit => unit.id)).toEqual(['t2']);
    expect(result.outcomes.find(outcome => outcome.taskId === 't2')?.status).toBe('deferred');
    expect(result.errors.map(entry => entry.code)).toEqual(['BUDGET_EXCEEDED']);
    expect(events.find(event => event.type === 'budget:exceeded')).toEqual({
      type: 'budget:exceeded',
      phase: 'execute',
      requested: 2,
      ceiling: 1,
      strategies: ['defer']
    });
  });

  it('enters conservation mode and skips the non-critical tail', async () => {
    const coordinator = new AgentSwarmCoordinator({
      config: swarmConfig({ maxConcurrentWorkers: 2, conservation: { maxIterations: 2 } }),
      executor: writeAll
    });
    const events = collect(coordinator);

    const tasks = [
      task('t1', ['a/x.ts'], { critical: true }),
      task('t2', ['b/x.ts'], { critical: true }),
      task('t3', ['c/x.ts']),
      task('t4', ['d/x.ts']),
      task('t5', ['e/x.ts']),
      task('t6', ['f/x.ts'])
    ];
    const result = await coordinator.runPhase(executePhase, tasks);

    expect(result.completed).toEqual(['t1', 't2', 't3', 't4']);
    expect(result.skipped).toEqual(['t5', 't6']);
    expect(result.conservation).toBe(true);
    expect(result.waves).toBe(2);
    expect(events.filter(event => event.type === 'conservation:entered')).toEqual([
      { type: 'conservation:entered', trigger: 'iterations=2' }
    ]);
    expect(events.find(event => event.type === 'phase:early-completion')).toEqual({
      type: 'phase:early-completion',
      phase: 'execute',
      skippedTaskIds: ['t5', 't6']
    });
    expect(result.errors.map(entry => entry.code)).toContain('CONTEXT_PRESSURE');
    expect(coordinator.ceiling).toBe(2);
  });

  it('packs pending waves into fewer workers once conserving', async () => {
    const coordinator = new AgentSwarmCoordinator({
      config: swarmConfig({ maxConcurrentWorkers: 2, conservation: { maxIterations: 1 } }),
      executor: writeAll
    });
    const events = collect(coordinator);

    const result = await coordinator.runPhase(executePhase, [
      task('t1', ['a/x.ts'], { critical: true }),
      task('t2', ['b/x.ts'], { critical: true }),
      task('t3', ['c/x.ts'], { critical: true }),
      task('t4', ['d/x.ts']),
      task('t5', ['e/x.ts'])
    ]);

    expect(events.flatMap(event => event.type === 'wave:started' ? [event.taskIds] : [])).toEqual([
      ['t1', 't2'],
      ['merged:t3+t4', 't5']
    ]);
    expect(result.waves).toBe(2);
    expect(result.outcomes.map(outcome => [outcome.taskId, outcome.mergedInto, outcome.modifiedResources])).toEqual([
      ['t1', undefined, ['a/x.ts']],
      ['t2', undefined, ['b/x.ts']],
      ['t3', 'merged:t3+t4', ['c/x.ts']],
      ['t4', 'merged:t3+t4', ['d/x.ts']],
      ['t5', undefined, ['e/x.ts']]
    ]);
    expect(result.completed).toEqual(['t1', 't2', 't3', 't4', 't5']);
    expect(result.workersSpawned).toBe(4);
  });

  it('compresses worker summaries while conserving', async () => {
    const coordinator = new AgentSwarmCoordinator({
      config: swarmConfig({ conservation: { maxLogBytes: 10 } }),
      executor: async (_assignment, handle) => {
        handle.log('x'.repeat(20));
        return { summary: 'y'.repeat(300) };
      }
    });

    const result = await coordinator.runPhase(executePhase, [task('t1', ['a/x.ts'])]);
    expect(coordinator.conserving).toBe(true);
    expect(result.outcomes[0].summary).toBe(`${'y'.repeat(237)}...`);
  });

  describe('stalled workers', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('replaces a stalled worker exactly once', async () => {
      const assignments: string[] = [];
      const coordinator = new AgentSwarmCoordinator({
        config: swarmConfig({ stallGraceMs: 100, stallCheckIntervalMs: 10 }),
        executor: async (assignment, handle) => {
          assignments.push(assignment.workerId);
          if (assignment.kind === 'primary') return never();
          await handle.recordMutation('a/x.ts');
          return { summary: `took over from ${assignment.replacing}` };
        }
      });
      const events = collect(coordinator);

      const running = coordinator.runPhase(executePhase, [task('t1', ['a/x.ts'])]);
      await vi.advanceTimersByTimeAsync(150);
      const result = await running;

      expect(assignments).toEqual(['execute:t1', 'execute:t1~r1']);
      expect(result.completed).toEqual(['t1']);
      expect(result.replacements).toBe(1);
      expect(result.outcomes[0]).toMatchObject({
        workerId: 'execute:t1~r1',
        workers: ['execute:t1', 'execute:t1~r1'],
        replaced: true,
        summary: 'took over from execute:t1'
      });
      const stalls = events.filter(event => event.type === 'worker:stalled');
      expect(stalls).toHaveLength(1);
      expect(stalls[0]).toMatchObject({ workerId: 'execute:t1', replacementId: 'execute:t1~r1' });
    });

    it('fails the task when the replacement stalls too', async () => {
      const assignments: string[] = [];
      const coordinator = new AgentSwarmCoordinator({
        config: swarmConfig({ stallGraceMs: 100, stallCheckIntervalMs: 10, maxFixAttempts: 0 }),
        executor: async assignment => {
          assignments.push(assignment.workerId);
          return never();
        }
      });
      const events = collect(coordinator);

      const running = coordinator.runPhase(executePhase, [task('t1', ['a/x.ts'])]);
      await vi.advanceTimersByTimeAsync(300);
      const result = await running;

      expect(assignments).toEqual(['execute:t1', 'execute:t1~r1']);
      expect(result.failed).toEqual(['t1']);
      expect(events.filter(event => event.type === 'worker:stalled')).toHaveLength(2);
      expect(result.errors.filter(entry => entry.code === 'WORKER_STALL')).toHaveLength(2);
    });

    it('keeps a worker alive while it reports progress', async () => {
      const coordinator = new AgentSwarmCoordinator({
        config: swarmConfig({ stallGraceMs: 100, stallCheckIntervalMs: 10 }),
        executor: async (_assignment, handle) => {
          for (let i = 0; i < 5; i++) {
            await new Promise(resolve => setTimeout(resolve, 60));
            handle.reportProgress(`step ${i}`);
          }
          return { summary: 'slow but steady' };
        }
      });

      const running = coordinator.runPhase(executePhase, [task('t1', ['a/x.ts'])]);
      await vi.advanceTimersByTimeAsync(400);
      const result = await running;

      expect(result.completed).toEqual(['t1']);
      expect(result.replacements).toBe(0);
    });
  });
});
