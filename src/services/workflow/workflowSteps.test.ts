import { afterEach, describe, expect, it, vi } from 'vitest';
import { abortableDelay, describeSteps, WORKFLOW_STEPS } from './workflowSteps';

describe('describeSteps', () => {
  it('marks the completed prefix and the step in progress', () => {
    const steps = describeSteps(['journey-classifier', 'entity-parties'], true);

    expect(steps.map((step) => step.status)).toEqual(['complete', 'complete', 'running', 'pending', 'pending', 'pending']);
    expect(steps[2].label).toBe('Transactions Insights');
  });

  it('shows nothing running once the walk has finished', () => {
    const steps = describeSteps(WORKFLOW_STEPS, false);

    expect(steps.every((step) => step.status === 'complete')).toBe(true);
    expect(steps.map((step) => step.label)).toEqual([
      'Journey Classifier',
      'Entity & Parties',
      'Transactions Insights',
      'Companies House',
      'Risk & Rules',
      'KYB Summary Note',
    ]);
  });
});

describe('abortableDelay', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    const done = vi.fn();

    const delay = abortableDelay(2000, new AbortController().signal).then(done);
    await vi.advanceTimersByTimeAsync(1999);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await delay;

    expect(done).toHaveBeenCalledTimes(1);
  });

  it('rejects with the abort reason', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();

    const delay = abortableDelay(2000, controller.signal);
    controller.abort(new Error('reset'));

    await expect(delay).rejects.toThrow('reset');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('rejects immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('disposed'));

    await expect(abortableDelay(2000, controller.signal)).rejects.toThrow('disposed');
  });
});
