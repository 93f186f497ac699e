export * from './RiveAnimation';
export * from './PreviewMode';
export * from './hooks';
export { RiveCanvasView, createRiveCanvasView } from './riveCanvasView';
export { loadRiveRuntime } from './riveLoader';
