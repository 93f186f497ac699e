import React, { useState } from 'react';
import { ExampleAnimation } from './ExampleAnimation';
import { nextSkillLevel, type SkillLevel, type SkillState } from './skillLevel';

export function SimpleExample() {
  const [level, setLevel] = useState<SkillLevel>('beginner');
  const [reached, setReached] = useState<SkillState | null>(null);

  return (
    <div className="screen">
      <ExampleAnimation
        level={level}
        className="screen-animation"
        onStateChanged={setReached}
      />

      <span className="screen-status">{reached ?? '…'}</span>
      <button
        className="screen-action"
        onClick={() => setLevel((current) => nextSkillLevel(current))}
      >
        Next Type
      </button>
    </div>
  );
}
