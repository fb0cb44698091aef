import { describe, it, expect } from 'vitest';
import { type HookStep, aggregateExitCode, dispatch } from '../../src/hooks/dispatcher';
import { OperationalError } from '../../src/utils/errors';
import { Logger } from '../../src/utils/logger';

const logger = new Logger(null, 'test', false);

function step(name: string, run: HookStep['run']): HookStep {
  return { name, run };
}

describe('dispatch', () => {
  it('runs every step and blocks when any step is nonzero', async () => {
    const output: string[] = [];
    const ran: string[] = [];
    const steps = [
      step('secret-scan', async () => {
        ran.push('secret-scan');
        return { exitCode: 1, detail: '2 finding(s)' };
      }),
      step('workflow-pins', async () => {
        ran.push('workflow-pins');
        throw new OperationalError('workflow directory unreadable');
      }),
      step('large-files', async () => {
        ran.push('large-files');
        return { exitCode: 0 };
      }),
      step('extra', async () => ({ skipped: true, detail: 'disabled in config' })),
    ];

    const result = await dispatch(steps, { print: (line) => output.push(line), logger, action: 'push' });

    expect(ran).toEqual(['secret-scan', 'workflow-pins', 'large-files']);
    expect(result.exitCode).toBe(1);
    expect(result.outcomes).toEqual([
      { name: 'secret-scan', status: 'failed', exitCode: 1, detail: '2 finding(s)' },
      { name: 'workflow-pins', status: 'error', exitCode: 3, detail: 'workflow directory unreadable' },
      { name: 'large-files', status: 'passed', exitCode: 0, detail: undefined },
      { name: 'extra', status: 'skipped', exitCode: 0, detail: 'disabled in config' },
    ]);
    expect(output[0]).toBe('');
    expect(output[1]).toContain('workflow directory unreadable');
    expect(output[2]).toContain('Checks failed, push blocked');
  });

  it('allows the action when every step passes or is skipped', async () => {
    const output: string[] = [];
    const result = await dispatch(
      [step('a', async () => ({ exitCode: 0 })), step('b', async () => ({ skipped: true, detail: 'off' }))],
      { print: (line) => output.push(line), logger, action: 'push' },
    );

    expect(result.exitCode).toBe(0);
    expect(output[2]).toContain('All checks passed, push allowed');
  });

  it('reduces any nonzero step code to 1', () => {
    expect(aggregateExitCode([])).toBe(0);
    expect(
      aggregateExitCode([
        { name: 'a', status: 'passed', exitCode: 0 },
        { name: 'b', status: 'failed', exitCode: 2 },
      ]),
    ).toBe(1);
  });
});
