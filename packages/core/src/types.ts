export type Fit =
  | 'contain'
  | 'cover'
  | 'fill'
  | 'fitWidth'
  | 'fitHeight'
  | 'none'
  | 'scaleDown';

export type Alignment =
  | 'center'
  | 'topLeft'
  | 'topCenter'
  | 'topRight'
  | 'centerLeft'
  | 'centerRight'
  | 'bottomLeft'
  | 'bottomCenter'
  | 'bottomRight';

// 'auto' keeps whatever loop mode the animation was authored with.
export type LoopMode = 'auto' | 'oneShot' | 'loop' | 'pingPong';

export interface AnimationDescription {
  readonly resource: string;
  readonly artboardName?: string;
  readonly animationName?: string;
  readonly stateMachineName?: string;
  readonly autoplay: boolean;
  readonly fit: Fit;
  readonly alignment: Alignment;
  readonly loop: LoopMode;
}

export type StateMachineInput =
  | { readonly kind: 'trigger'; readonly name: string; fire(): void }
  | {
      readonly kind: 'boolean';
      readonly name: string;
      readonly value: boolean;
      set(value: boolean): void;
    }
  | {
      readonly kind: 'number';
      readonly name: string;
      readonly value: number;
      set(value: number): void;
    };

export type StateMachineInputKind = StateMachineInput['kind'];

export interface StateMachineHandle {
  readonly name: string;
  readonly inputNames: readonly string[];
  input(name: string): StateMachineInput | undefined;
}

export interface AnimationEvent {
  name: string;
  properties?: Record<string, unknown>;
}

/**
 * Notification sink registered on an {@link AnimationView}. Every callback is
 * invoked synchronously from inside the engine, in the order the engine
 * raises them.
 */
export interface AnimationViewListener {
  onAdvance?(elapsedSeconds: number): void;
  onLoop?(animationName: string): void;
  onPause?(animationName: string): void;
  onPlay?(animationName: string): void;
  onStop?(animationName: string): void;
  onStateChanged?(stateMachineName: string, stateName: string): void;
  onEvent?(event: AnimationEvent): void;
}

export interface PlayOptions {
  /**
   * When false the state machine keeps its current state instead of being
   * reset to its entry state. Defaults to true.
   */
  settleInitialState?: boolean;
}

/**
 * The imperative view supplied by the animation engine. Its lifetime belongs
 * to the UI layer; controllers only hold a reference between attach and detach.
 */
export interface AnimationView {
  readonly stateMachines: readonly StateMachineHandle[];
  readonly isPlaying: boolean;
  play(stateMachineName: string, options?: PlayOptions): void;
  setAnimation(description: AnimationDescription): void;
  addListener(listener: AnimationViewListener): void;
  removeListener(listener: AnimationViewListener): void;
  dispose(): void;
}

export type StateChangedListener = (
  stateMachineName: string,
  stateName: string
) => void;
