// @vitest-environment jsdom

import { act, render, waitFor } from '@testing-library/react';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeAnimationView } from '@rive-sync/core/testing';

import { ExampleAnimation } from './ExampleAnimation';
import { SKILLS_STATE_MACHINE } from './skillLevel';

describe('ExampleAnimation', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('applies the requested level and reports distinct skill states', async () => {
    const view = new FakeAnimationView();
    const machine = view.loadStateMachine(SKILLS_STATE_MACHINE, [
      { kind: 'number', name: 'Level' },
    ]);
    const factory = (_canvas: HTMLCanvasElement) => view;
    const onStateChanged = vi.fn();

    const { rerender } = render(
      <ExampleAnimation
        level="beginner"
        onStateChanged={onStateChanged}
        viewFactory={factory}
      />
    );

    await waitFor(() =>
      expect(machine.calls).toEqual([
        { input: 'Level', action: 'set', value: 0 },
      ])
    );
    expect(view.appliedAnimations[0]).toMatchObject({
      resource: '/skills.riv',
      artboardName: 'New Artboard',
      stateMachineName: SKILLS_STATE_MACHINE,
      autoplay: false,
    });

    view.emitStateChanged(SKILLS_STATE_MACHINE, 'Beginner');
    view.emitStateChanged(SKILLS_STATE_MACHINE, 'Beginner');
    view.emitStateChanged(SKILLS_STATE_MACHINE, 'Entry');

    rerender(
      <ExampleAnimation
        level="advanced"
        onStateChanged={onStateChanged}
        viewFactory={factory}
      />
    );
    await waitFor(() => expect(machine.calls).toHaveLength(2));
    view.emitStateChanged(SKILLS_STATE_MACHINE, 'Advanced');

    expect(machine.calls[1]).toEqual({
      input: 'Level',
      action: 'set',
      value: 2,
    });
    expect(view.playCalls).toHaveLength(1);
    expect(onStateChanged.mock.calls).toEqual([['Beginner'], ['Advanced']]);
  });

  describe('while the animation is still loading', () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    async function advance(ms: number) {
      await act(async () => {
        await vi.advanceTimersByTimeAsync(ms);
      });
    }

    it('applies only the latest level when it changes before loading', async () => {
      const view = new FakeAnimationView();
      const factory = (_canvas: HTMLCanvasElement) => view;

      const { rerender } = render(
        <ExampleAnimation level="advanced" viewFactory={factory} />
      );
      await advance(4);
      await advance(4);
      rerender(<ExampleAnimation level="beginner" viewFactory={factory} />);
      await advance(5);
      const machine = view.loadStateMachine(SKILLS_STATE_MACHINE, [
        { kind: 'number', name: 'Level' },
      ]);
      await advance(50);

      expect(machine.calls).toEqual([
        { input: 'Level', action: 'set', value: 0 },
      ]);
      expect(console.warn).not.toHaveBeenCalled();
    });

    it('applies the first level when loading takes longer than 200ms', async () => {
      const view = new FakeAnimationView();
      const factory = (_canvas: HTMLCanvasElement) => view;

      render(<ExampleAnimation level="intermediate" viewFactory={factory} />);
      await advance(300);
      const machine = view.loadStateMachine(SKILLS_STATE_MACHINE, [
        { kind: 'number', name: 'Level' },
      ]);
      await advance(16);

      expect(machine.calls).toEqual([
        { input: 'Level', action: 'set', value: 1 },
      ]);
      expect(console.warn).not.toHaveBeenCalled();
    });
  });
});
