import React, { useEffect, useMemo, useRef } from 'react';
import { animationDescription } from '@rive-sync/core';
import {
  RiveAnimation,
  useStateChangedListener,
  useStateController,
  type AnimationViewFactory,
} from '@rive-sync/react';
import {
  applySkillLevel,
  skillStateFromName,
  SKILLS_ARTBOARD,
  SKILLS_RESOURCE,
  SKILLS_STATE_MACHINE,
  SKILLS_TIMINGS,
  type SkillLevel,
  type SkillState,
} from './skillLevel';

interface ExampleAnimationProps {
  level: SkillLevel;
  className?: string;
  style?: React.CSSProperties;
  onStateChanged?: (state: SkillState) => void;
  viewFactory?: AnimationViewFactory;
}

/**
 * Shows how a {@link useStateController} controller is wired to a
 * {@link RiveAnimation}.
 *
 * `level` is the presentation the app wants; here it maps 1:1 to a value of
 * the `Level` input, but a richer animation may combine several inputs.
 * `onStateChanged` reports each distinct state the animation reaches.
 */
export function ExampleAnimation({
  level,
  className,
  style,
  onStateChanged,
  viewFactory,
}: ExampleAnimationProps) {
  const controller = useStateController({ timings: SKILLS_TIMINGS });
  const animation = useMemo(
    () =>
      animationDescription(SKILLS_RESOURCE, {
        artboardName: SKILLS_ARTBOARD,
        stateMachineName: SKILLS_STATE_MACHINE,
        // applySkillLevel starts playback
        autoplay: false,
      }),
    []
  );

  useEffect(() => {
    // A newer level replaces one that is still waiting for the animation
    const request = new AbortController();
    applySkillLevel(controller, level, request.signal).then((applied) => {
      if (!applied && !request.signal.aborted) {
        console.warn(`ExampleAnimation: could not apply level "${level}"`);
      }
    });
    return () => request.abort();
  }, [controller, level]);

  const previousState = useRef<SkillState | null>(null);
  useStateChangedListener(controller, (_, stateName) => {
    const state = skillStateFromName(stateName);
    if (!state || state === previousState.current) return;
    previousState.current = state;
    onStateChanged?.(state);
  });

  return (
    <RiveAnimation
      animation={animation}
      stateController={controller}
      className={className}
      style={style}
      viewFactory={viewFactory}
    />
  );
}
