import React, { useState } from 'react';
import { SimpleExample } from './SimpleExample';
import { ViewChurnExample } from './ViewChurnExample';

const EXAMPLES = {
  simple: { title: 'Simple example', Component: SimpleExample },
  churn: { title: 'View churn', Component: ViewChurnExample },
} as const;

type ExampleId = keyof typeof EXAMPLES;

export function App() {
  const [active, setActive] = useState<ExampleId>('simple');
  const { Component } = EXAMPLES[active];

  return (
    <div className="app">
      <nav className="app-nav">
        <button onClick={() => setActive('simple')} disabled={active === 'simple'}>
          {EXAMPLES.simple.title}
        </button>
        <button onClick={() => setActive('churn')} disabled={active === 'churn'}>
          {EXAMPLES.churn.title}
        </button>
      </nav>
      <Component />
    </div>
  );
}
