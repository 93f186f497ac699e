import type {
  AnimationView,
  AnimationViewListener,
  StateChangedListener,
  StateMachineInput,
  StateMachineInputKind,
} from '../types';
import { consoleLogger, type SyncLogger } from './logger';
import {
  describeSyncFailure,
  failed,
  succeeded,
  type SyncFailure,
  type SyncOperation,
  type SyncOutcome,
} from './outcome';
import { pollFor } from './poll';
import { resolveSyncTimings, type SyncTimings } from './timings';
import { createValueSlot, firstNonNull } from './valueSlot';

export interface StateSyncControllerOptions {
  timings?: Partial<SyncTimings>;
  logger?: SyncLogger;
  /** Receives the cause of every operation that resolves to `false`. */
  onFailure?: (operation: SyncOperation, failure: SyncFailure) => void;
}

export interface InputOptions {
  /** Abandons the operation; an aborted operation never touches the input. */
  signal?: AbortSignal;
}

type InputOfKind<K extends StateMachineInputKind> = Extract<
  StateMachineInput,
  { kind: K }
>;

function isInputOfKind<K extends StateMachineInputKind>(
  input: StateMachineInput,
  kind: K
): input is InputOfKind<K> {
  return input.kind === kind;
}

// Views report playing before any state machine is loaded, so both are needed.
function isLoadedAndPlaying(view: AnimationView): boolean {
  return view.stateMachines.length > 0 && view.isPlaying;
}

/**
 * Drives an {@link AnimationView} from declarative UI code.
 *
 * Operations wait for a view to be attached and for its state machines to
 * load instead of failing, and every state change raised by the view is
 * forwarded to the registered listeners. Listeners are used rather than an
 * observable "current state" value because a render only sees the latest
 * value, which would lose states entered and left between two renders.
 */
export class StateSyncController {
  private readonly timings: SyncTimings;
  private readonly logger: SyncLogger;
  private readonly onFailure?: StateSyncControllerOptions['onFailure'];

  private readonly view = createValueSlot<AnimationView | null>(null);
  private detached = false;
  private readonly listeners: StateChangedListener[] = [];

  private readonly viewListener: AnimationViewListener = {
    onStateChanged: (stateMachineName, stateName) => {
      for (const listener of Array.from(this.listeners)) {
        listener(stateMachineName, stateName);
      }
      this.logger.info(
        `StateSyncController: stateChanged(${stateMachineName}, ${stateName})`
      );
    },
  };

  constructor(options: StateSyncControllerOptions = {}) {
    this.timings = resolveSyncTimings(options.timings);
    this.logger = options.logger ?? consoleLogger;
    this.onFailure = options.onFailure;
  }

  get attachedView(): AnimationView | null {
    return this.view.value;
  }

  get isDetached(): boolean {
    return this.detached;
  }

  get listenerCount(): number {
    return this.listeners.length;
  }

  attach(view: AnimationView): void {
    const existing = this.view.value;
    if (existing === view) return;
    existing?.removeListener(this.viewListener);

    this.detached = false;
    view.addListener(this.viewListener);
    this.view.set(view);
  }

  detach(): void {
    this.view.value?.removeListener(this.viewListener);
    this.detached = true;
    this.view.set(null);
  }

  /**
   * Whether a state machine has been loaded and the view is playing. Waits up
   * to `viewTimeoutMs` for a view to be attached.
   */
  async isReadyAndPlaying(): Promise<boolean> {
    const outcome = await this.withView((view) =>
      succeeded(isLoadedAndPlaying(view))
    );
    return this.settle('isReadyAndPlaying', outcome);
  }

  /**
   * Plays `stateMachineName` unless something is already loaded and playing.
   * The state machine keeps its current state so inputs set before playback
   * are not overwritten by the entry state.
   */
  async play(stateMachineName: string): Promise<boolean> {
    const outcome = await this.withView((view) => {
      if (!isLoadedAndPlaying(view)) {
        view.play(stateMachineName, { settleInitialState: false });
      }
      return succeeded(true);
    });
    return this.settle('play', outcome);
  }

  fireTrigger(
    stateMachineName: string,
    inputName: string,
    options: InputOptions = {}
  ): Promise<boolean> {
    return this.applyInput(
      'fireTrigger',
      stateMachineName,
      inputName,
      'trigger',
      (input) => input.fire(),
      options
    );
  }

  setBoolean(
    stateMachineName: string,
    inputName: string,
    value: boolean,
    options: InputOptions = {}
  ): Promise<boolean> {
    return this.applyInput(
      'setBoolean',
      stateMachineName,
      inputName,
      'boolean',
      (input) => input.set(value),
      options
    );
  }

  setNumber(
    stateMachineName: string,
    inputName: string,
    value: number,
    options: InputOptions = {}
  ): Promise<boolean> {
    return this.applyInput(
      'setNumber',
      stateMachineName,
      inputName,
      'number',
      (input) => input.set(value),
      options
    );
  }

  /**
   * Waits for `stateName` to be entered on `stateMachineName`.
   *
   * @returns `true` if the state was reached within `timeoutMs`
   */
  awaitState(
    stateMachineName: string,
    stateName: string,
    timeoutMs: number = this.timings.awaitStateTimeoutMs
  ): Promise<boolean> {
    return new Promise((resolve) => {
      let settled = false;
      const finish = (reached: boolean) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.unregisterListener(listener);
        resolve(reached);
      };
      const listener: StateChangedListener = (machineName, name) => {
        if (machineName === stateMachineName && name === stateName) {
          finish(true);
        }
      };

      this.registerListener(listener);
      const timer = setTimeout(() => finish(false), timeoutMs);
    });
  }

  /**
   * Registers a listener for every state change of the attached view. Pair
   * with {@link unregisterListener}; registering the same function twice
   * delivers each change to it twice.
   */
  registerListener(listener: StateChangedListener): void {
    this.listeners.push(listener);
  }

  unregisterListener(listener: StateChangedListener): void {
    const index = this.listeners.indexOf(listener);
    if (index !== -1) this.listeners.splice(index, 1);
  }

  private async withView<T>(
    action: (
      view: AnimationView
    ) => SyncOutcome<T> | Promise<SyncOutcome<T>>
  ): Promise<SyncOutcome<T>> {
    if (this.detached) return failed({ kind: 'controller-detached' });

    const timeoutMs = this.timings.viewTimeoutMs;
    const view = await firstNonNull(this.view, timeoutMs);
    if (!view) return failed({ kind: 'view-unavailable', timeoutMs });

    return action(view);
  }

  private async applyInput<K extends StateMachineInputKind>(
    operation: SyncOperation,
    stateMachineName: string,
    inputName: string,
    kind: K,
    apply: (input: InputOfKind<K>) => void,
    { signal }: InputOptions
  ): Promise<boolean> {
    const outcome = await this.withView(async (view) => {
      const timeoutMs = this.timings.lookupTimeoutMs;
      const stateMachine = await pollFor(
        () => view.stateMachines.find((m) => m.name === stateMachineName),
        { timeoutMs, intervalMs: this.timings.pollIntervalMs, signal }
      );
      if (signal?.aborted) return failed<boolean>({ kind: 'aborted' });
      if (!stateMachine) {
        return failed<boolean>({
          kind: 'state-machine-not-found',
          stateMachineName,
          inputName,
          timeoutMs,
        });
      }

      const input = stateMachine.inputNames.includes(inputName)
        ? stateMachine.input(inputName)
        : undefined;
      if (!input) {
        return failed<boolean>({
          kind: 'input-not-found',
          stateMachineName,
          inputName,
        });
      }
      const actual = input.kind;
      if (!isInputOfKind(input, kind)) {
        return failed<boolean>({
          kind: 'input-kind-mismatch',
          stateMachineName,
          inputName,
          expected: kind,
          actual,
        });
      }

      apply(input);
      return succeeded(true);
    });
    return this.settle(operation, outcome);
  }

  private settle(
    operation: SyncOperation,
    outcome: SyncOutcome<boolean>
  ): boolean {
    if (outcome.ok) return outcome.value;

    const message = `StateSyncController.${operation}: ${describeSyncFailure(outcome.failure)}`;
    if (outcome.failure.kind === 'aborted') {
      this.logger.info(message);
    } else {
      this.logger.warn(message);
    }
    this.onFailure?.(operation, outcome.failure);
    return false;
  }
}
