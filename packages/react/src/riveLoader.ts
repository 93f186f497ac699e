// The Rive runtime pulls in its WASM on first use, so it is only imported
// once a live view is actually needed.
import riveWasmUrl from '@rive-app/canvas/rive.wasm?url';

export type RiveRuntime = typeof import('@rive-app/canvas');

let runtime: Promise<RiveRuntime> | null = null;

export function loadRiveRuntime(): Promise<RiveRuntime> {
  if (!runtime) {
    runtime = import('@rive-app/canvas').then(
      (rive) => {
        // Serve the WASM bundled with the package instead of the CDN default
        rive.RuntimeLoader.setWasmUrl(riveWasmUrl);
        return rive;
      },
      (error: unknown) => {
        runtime = null;
        throw error;
      }
    );
  }
  return runtime;
}
