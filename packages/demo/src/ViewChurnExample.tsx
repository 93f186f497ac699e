import React, { useEffect, useState } from 'react';
import { ExampleAnimation } from './ExampleAnimation';

const TRANSITION_MS = 300;

/**
 * Replaces the whole screen, and with it the animation view and controller,
 * on every click. The outgoing screen stays mounted for the length of the
 * transition, so two views of the same file are alive at once. Used to
 * reproduce crashes in the engine under view recycling.
 */
export function ViewChurnExample() {
  const [screens, setScreens] = useState<number[]>([0]);

  useEffect(() => {
    if (screens.length < 2) return;
    const timer = setTimeout(
      () => setScreens((current) => current.slice(-1)),
      TRANSITION_MS
    );
    return () => clearTimeout(timer);
  }, [screens]);

  const nextScreen = () =>
    setScreens((current) => [...current, current[current.length - 1] + 1]);

  return (
    <div className="screen">
      {screens.map((id, index) => (
        <div
          key={id}
          className="screen-layer"
          style={{ opacity: index === screens.length - 1 ? 1 : 0 }}
        >
          <ExampleAnimation level="beginner" className="screen-animation" />
        </div>
      ))}

      <button className="screen-action" onClick={nextScreen}>
        Next Screen
      </button>
    </div>
  );
}
