import React, { useEffect, useMemo, useRef, useState } from 'react';
import clsx from 'clsx';
import {
  createAnimationHost,
  type AnimationDescription,
  type AnimationView,
  type StateSyncController,
} from '@rive-sync/core';
import { usePreviewMode } from './PreviewMode';
import { createRiveCanvasView } from './riveCanvasView';

export type AnimationViewFactory = (
  canvas: HTMLCanvasElement
) => AnimationView | Promise<AnimationView>;

export interface RiveAnimationProps {
  animation: AnimationDescription;
  stateController?: StateSyncController | null;
  className?: string;
  style?: React.CSSProperties;
  /**
   * Creates the engine view for the mounted canvas. Must be stable across
   * renders: a new factory recreates the view.
   */
  viewFactory?: AnimationViewFactory;
}

export const PREVIEW_PLACEHOLDER_COLOR = '#555555';
export const PREVIEW_PLACEHOLDER_RADIUS = 8;

export function RiveAnimation(props: RiveAnimationProps) {
  const preview = usePreviewMode();

  // The engine cannot run in previews, so draw a box of the same size instead
  if (preview) {
    return (
      <div
        className={clsx('rive-animation', 'rive-animation-preview', props.className)}
        style={{
          background: PREVIEW_PLACEHOLDER_COLOR,
          borderRadius: PREVIEW_PLACEHOLDER_RADIUS,
          ...props.style,
        }}
      />
    );
  }

  return <LiveRiveAnimation {...props} />;
}

function LiveRiveAnimation({
  animation,
  stateController,
  className,
  style,
  viewFactory = createRiveCanvasView,
}: RiveAnimationProps) {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const [view, setView] = useState<AnimationView | null>(null);

  const host = useMemo(
    () => createAnimationHost(stateController),
    [stateController]
  );

  // Detach before the view is disposed, and whenever the controller changes
  useEffect(() => {
    if (!view) return;
    return () => host.release();
  }, [host, view]);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;

    let cancelled = false;
    let created: AnimationView | null = null;

    Promise.resolve(viewFactory(canvas)).then(
      (next) => {
        if (cancelled) {
          next.dispose();
          return;
        }
        created = next;
        setView(next);
      },
      (error: unknown) => {
        console.warn('RiveAnimation: failed to create animation view', error);
      }
    );

    return () => {
      cancelled = true;
      created?.dispose();
      setView(null);
    };
  }, [viewFactory]);

  useEffect(() => {
    if (!view) return;
    host.update(view, animation);
  }, [host, view, animation]);

  return (
    <canvas
      ref={canvasRef}
      className={clsx('rive-animation', className)}
      style={style}
    />
  );
}
