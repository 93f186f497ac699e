import React, { createContext, useContext } from 'react';

const PreviewModeContext = createContext(false);

interface PreviewModeProps {
  /** Defaults to true; pass false to re-enable live views inside a preview. */
  enabled?: boolean;
  children?: React.ReactNode;
}

/**
 * Marks a static rendering context (design previews, snapshots, server
 * rendering) where no animation engine is available. Animations inside it
 * render an inert placeholder.
 */
export function PreviewMode({ enabled = true, children }: PreviewModeProps) {
  return (
    <PreviewModeContext.Provider value={enabled}>
      {children}
    </PreviewModeContext.Provider>
  );
}

export function usePreviewMode(): boolean {
  return useContext(PreviewModeContext);
}
