import type {
  Alignment,
  AnimationDescription,
  AnimationView,
  AnimationViewListener,
  Fit,
  PlayOptions,
  StateMachineHandle,
  StateMachineInput,
} from '@rive-sync/core';
import type {
  Rive,
  StateMachineInput as RiveStateMachineInput,
} from '@rive-app/canvas';
import { loadRiveRuntime, type RiveRuntime } from './riveLoader';

type RiveEventLike = { data?: unknown };

function stringList(data: unknown): string[] {
  if (typeof data === 'string') return [data];
  if (!Array.isArray(data)) return [];
  return data.filter((item): item is string => typeof item === 'string');
}

function loopedAnimation(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null) return undefined;
  if (!('animation' in data) || typeof data.animation !== 'string') {
    return undefined;
  }
  return data.animation;
}

function customEventName(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null) return undefined;
  if (!('name' in data) || typeof data.name !== 'string') return undefined;
  return data.name;
}

function customEventProperties(
  data: unknown
): Record<string, unknown> | undefined {
  if (typeof data !== 'object' || data === null) return undefined;
  if (!('properties' in data)) return undefined;
  const { properties } = data;
  if (typeof properties !== 'object' || properties === null) return undefined;
  return { ...properties };
}

/**
 * {@link AnimationView} over a `Rive` instance from `@rive-app/canvas`.
 *
 * Every `setAnimation` with a new description replaces the underlying `Rive`
 * instance; listeners stay registered on this view and follow the new
 * instance.
 */
export class RiveCanvasView implements AnimationView {
  private instance: Rive | null = null;
  private loaded = false;
  private description: AnimationDescription | null = null;
  private readonly listeners = new Set<AnimationViewListener>();

  constructor(
    private readonly runtime: RiveRuntime,
    private readonly canvas: HTMLCanvasElement
  ) {}

  get stateMachines(): StateMachineHandle[] {
    const rive = this.instance;
    if (!rive || !this.loaded) return [];

    const handles: StateMachineHandle[] = [];
    for (const name of rive.stateMachineNames) {
      // Only instanced state machines expose inputs
      const inputs = rive.stateMachineInputs(name);
      if (inputs) handles.push(this.stateMachineHandle(name, inputs));
    }
    return handles;
  }

  get isPlaying(): boolean {
    return this.loaded && (this.instance?.isPlaying ?? false);
  }

  play(stateMachineName: string, options: PlayOptions = {}): void {
    const rive = this.instance;
    if (!rive) return;
    if (options.settleInitialState === false) {
      rive.play(stateMachineName);
    } else {
      rive.reset({ stateMachines: stateMachineName, autoplay: true });
    }
  }

  setAnimation(description: AnimationDescription): void {
    this.instance?.cleanup();
    this.loaded = false;
    this.description = description;

    if (description.loop !== 'auto') {
      console.warn(
        `RiveCanvasView.setAnimation: loop mode "${description.loop}" cannot be overridden by the canvas runtime; using the authored loop mode`
      );
    }

    const { Layout, EventType } = this.runtime;
    const rive = new this.runtime.Rive({
      src: description.resource,
      canvas: this.canvas,
      artboard: description.artboardName,
      animations: description.animationName,
      stateMachines: description.stateMachineName,
      autoplay: description.autoplay,
      layout: new Layout({
        fit: this.riveFit(description.fit),
        alignment: this.riveAlignment(description.alignment),
      }),
    });
    this.instance = rive;

    const current = (handler: (event: RiveEventLike) => void) => {
      return (event: RiveEventLike) => {
        if (this.instance === rive) handler(event);
      };
    };

    rive.on(
      EventType.Load,
      current(() => {
        this.loaded = true;
        rive.resizeDrawingSurfaceToCanvas();
      })
    );
    rive.on(
      EventType.Advance,
      current((event) => {
        const elapsed = event.data;
        if (typeof elapsed !== 'number') return;
        this.notify((l) => l.onAdvance?.(elapsed));
      })
    );
    rive.on(
      EventType.Play,
      current(({ data }) => {
        for (const name of stringList(data)) this.notify((l) => l.onPlay?.(name));
      })
    );
    rive.on(
      EventType.Pause,
      current(({ data }) => {
        for (const name of stringList(data)) {
          this.notify((l) => l.onPause?.(name));
        }
      })
    );
    rive.on(
      EventType.Stop,
      current(({ data }) => {
        for (const name of stringList(data)) this.notify((l) => l.onStop?.(name));
      })
    );
    rive.on(
      EventType.Loop,
      current(({ data }) => {
        const name = loopedAnimation(data);
        if (name !== undefined) this.notify((l) => l.onLoop?.(name));
      })
    );
    rive.on(
      EventType.StateChange,
      current(({ data }) => {
        const stateMachineName = this.changedStateMachine(rive);
        for (const stateName of stringList(data)) {
          this.notify((l) => l.onStateChanged?.(stateMachineName, stateName));
        }
      })
    );
    rive.on(
      EventType.RiveEvent,
      current(({ data }) => {
        const name = customEventName(data);
        if (name === undefined) return;
        const properties = customEventProperties(data);
        this.notify((l) => l.onEvent?.({ name, properties }));
      })
    );
  }

  addListener(listener: AnimationViewListener): void {
    this.listeners.add(listener);
  }

  removeListener(listener: AnimationViewListener): void {
    this.listeners.delete(listener);
  }

  dispose(): void {
    this.instance?.cleanup();
    this.instance = null;
    this.loaded = false;
    this.listeners.clear();
  }

  private notify(deliver: (listener: AnimationViewListener) => void): void {
    for (const listener of Array.from(this.listeners)) deliver(listener);
  }

  // State change events only carry state names; attribute them to the
  // state machine that is playing, falling back to the described one.
  private changedStateMachine(rive: Rive): string {
    return (
      rive.playingStateMachineNames[0] ??
      this.description?.stateMachineName ??
      ''
    );
  }

  private stateMachineHandle(
    name: string,
    inputs: RiveStateMachineInput[]
  ): StateMachineHandle {
    const byName = new Map<string, StateMachineInput>();
    for (const input of inputs) {
      const mapped = this.mapInput(input);
      if (mapped) byName.set(input.name, mapped);
    }
    return {
      name,
      inputNames: Array.from(byName.keys()),
      input: (inputName) => byName.get(inputName),
    };
  }

  private mapInput(input: RiveStateMachineInput): StateMachineInput | null {
    const { StateMachineInputType } = this.runtime;
    switch (input.type) {
      case StateMachineInputType.Trigger:
        return { kind: 'trigger', name: input.name, fire: () => input.fire() };
      case StateMachineInputType.Boolean:
        return {
          kind: 'boolean',
          name: input.name,
          get value() {
            return input.value === true;
          },
          set(value: boolean) {
            input.value = value;
          },
        };
      case StateMachineInputType.Number:
        return {
          kind: 'number',
          name: input.name,
          get value() {
            return typeof input.value === 'number' ? input.value : 0;
          },
          set(value: number) {
            input.value = value;
          },
        };
      default:
        return null;
    }
  }

  private riveFit(fit: Fit) {
    const { Fit: RiveFit } = this.runtime;
    const fits = {
      contain: RiveFit.Contain,
      cover: RiveFit.Cover,
      fill: RiveFit.Fill,
      fitWidth: RiveFit.FitWidth,
      fitHeight: RiveFit.FitHeight,
      none: RiveFit.None,
      scaleDown: RiveFit.ScaleDown,
    } satisfies Record<Fit, unknown>;
    return fits[fit];
  }

  private riveAlignment(alignment: Alignment) {
    const { Alignment: RiveAlignment } = this.runtime;
    const alignments = {
      center: RiveAlignment.Center,
      topLeft: RiveAlignment.TopLeft,
      topCenter: RiveAlignment.TopCenter,
      topRight: RiveAlignment.TopRight,
      centerLeft: RiveAlignment.CenterLeft,
      centerRight: RiveAlignment.CenterRight,
      bottomLeft: RiveAlignment.BottomLeft,
      bottomCenter: RiveAlignment.BottomCenter,
      bottomRight: RiveAlignment.BottomRight,
    } satisfies Record<Alignment, unknown>;
    return alignments[alignment];
  }
}

export async function createRiveCanvasView(
  canvas: HTMLCanvasElement
): Promise<AnimationView> {
  const runtime = await loadRiveRuntime();
  return new RiveCanvasView(runtime, canvas);
}
