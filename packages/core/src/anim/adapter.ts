import { sameAnimationDescription } from '../description';
import type { StateSyncController } from '../sync/controller';
import type { AnimationDescription, AnimationView } from '../types';

export interface AnimationHostAdapter {
  /**
   * Applies `description` to `view` (skipped when that view already shows an
   * equal description) and attaches the view to the controller.
   */
  update(view: AnimationView, description: AnimationDescription): void;

  /** Detaches the controller from its view. Safe to call more than once. */
  release(): void;
}

// Shared by every host so a view handed from one host to another is not
// reloaded with a description it already shows.
const appliedDescriptions = new WeakMap<AnimationView, AnimationDescription>();

export function createAnimationHost(
  controller?: StateSyncController | null
): AnimationHostAdapter {
  return {
    update(view, description) {
      const applied = appliedDescriptions.get(view);
      if (!sameAnimationDescription(applied, description)) {
        view.setAnimation(description);
        appliedDescriptions.set(view, description);
      }
      controller?.attach(view);
    },

    release() {
      controller?.detach();
    },
  };
}
