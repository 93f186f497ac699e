import type {
  AnimationDescription,
  AnimationEvent,
  AnimationView,
  AnimationViewListener,
  PlayOptions,
  StateMachineHandle,
  StateMachineInput,
} from '../types';

export type FakeInputSpec =
  | { kind: 'trigger'; name: string }
  | { kind: 'boolean'; name: string; value?: boolean }
  | { kind: 'number'; name: string; value?: number };

export type FakeInputCall =
  | { input: string; action: 'fire' }
  | { input: string; action: 'set'; value: boolean | number };

export class FakeStateMachine implements StateMachineHandle {
  readonly calls: FakeInputCall[] = [];
  private readonly inputs = new Map<string, StateMachineInput>();

  constructor(
    readonly name: string,
    specs: readonly FakeInputSpec[] = []
  ) {
    for (const spec of specs) this.inputs.set(spec.name, this.createInput(spec));
  }

  get inputNames(): readonly string[] {
    return Array.from(this.inputs.keys());
  }

  input(name: string): StateMachineInput | undefined {
    return this.inputs.get(name);
  }

  private createInput(spec: FakeInputSpec): StateMachineInput {
    const calls = this.calls;
    switch (spec.kind) {
      case 'trigger':
        return {
          kind: 'trigger',
          name: spec.name,
          fire: () => {
            calls.push({ input: spec.name, action: 'fire' });
          },
        };
      case 'boolean': {
        let value = spec.value ?? false;
        return {
          kind: 'boolean',
          name: spec.name,
          get value() {
            return value;
          },
          set(next: boolean) {
            value = next;
            calls.push({ input: spec.name, action: 'set', value: next });
          },
        };
      }
      case 'number': {
        let value = spec.value ?? 0;
        return {
          kind: 'number',
          name: spec.name,
          get value() {
            return value;
          },
          set(next: number) {
            value = next;
            calls.push({ input: spec.name, action: 'set', value: next });
          },
        };
      }
    }
  }
}

/**
 * In-memory {@link AnimationView} for tests. State machines are loaded and
 * transitions raised by hand, the way the engine would do it asynchronously.
 */
export class FakeAnimationView implements AnimationView {
  stateMachines: FakeStateMachine[] = [];
  isPlaying = false;
  disposed = false;

  readonly playCalls: Array<{ stateMachineName: string; options?: PlayOptions }> =
    [];
  readonly appliedAnimations: AnimationDescription[] = [];
  readonly addedListeners: AnimationViewListener[] = [];
  readonly removedListeners: AnimationViewListener[] = [];

  private listeners: AnimationViewListener[] = [];

  get listenerCount(): number {
    return this.listeners.length;
  }

  loadStateMachine(
    name: string,
    inputs: readonly FakeInputSpec[] = []
  ): FakeStateMachine {
    const machine = new FakeStateMachine(name, inputs);
    this.stateMachines = [...this.stateMachines, machine];
    return machine;
  }

  play(stateMachineName: string, options?: PlayOptions): void {
    this.playCalls.push({ stateMachineName, options });
    this.isPlaying = true;
    for (const listener of Array.from(this.listeners)) {
      listener.onPlay?.(stateMachineName);
    }
  }

  setAnimation(description: AnimationDescription): void {
    this.appliedAnimations.push(description);
  }

  addListener(listener: AnimationViewListener): void {
    this.addedListeners.push(listener);
    this.listeners.push(listener);
  }

  removeListener(listener: AnimationViewListener): void {
    this.removedListeners.push(listener);
    this.listeners = this.listeners.filter((l) => l !== listener);
  }

  emitStateChanged(stateMachineName: string, stateName: string): void {
    for (const listener of Array.from(this.listeners)) {
      listener.onStateChanged?.(stateMachineName, stateName);
    }
  }

  emitEvent(event: AnimationEvent): void {
    for (const listener of Array.from(this.listeners)) {
      listener.onEvent?.(event);
    }
  }

  dispose(): void {
    this.disposed = true;
    this.listeners = [];
  }
}

export function createFakeView(): FakeAnimationView {
  return new FakeAnimationView();
}
