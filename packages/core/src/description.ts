import type { AnimationDescription } from './types';

export type AnimationDescriptionOverrides = Partial<
  Omit<AnimationDescription, 'resource'>
>;

export const DEFAULT_ANIMATION_OPTIONS = {
  autoplay: true,
  fit: 'contain',
  alignment: 'center',
  loop: 'auto',
} as const satisfies Omit<
  AnimationDescription,
  'resource' | 'artboardName' | 'animationName' | 'stateMachineName'
>;

/**
 * Builds a frozen {@link AnimationDescription}. Two descriptions built from the
 * same arguments compare equal under {@link sameAnimationDescription}, so it is
 * safe to rebuild one on every render.
 */
export function animationDescription(
  resource: string,
  overrides: AnimationDescriptionOverrides = {}
): AnimationDescription {
  return Object.freeze({
    resource,
    artboardName: overrides.artboardName,
    animationName: overrides.animationName,
    stateMachineName: overrides.stateMachineName,
    autoplay: overrides.autoplay ?? DEFAULT_ANIMATION_OPTIONS.autoplay,
    fit: overrides.fit ?? DEFAULT_ANIMATION_OPTIONS.fit,
    alignment: overrides.alignment ?? DEFAULT_ANIMATION_OPTIONS.alignment,
    loop: overrides.loop ?? DEFAULT_ANIMATION_OPTIONS.loop,
  });
}

export function sameAnimationDescription(
  a: AnimationDescription | null | undefined,
  b: AnimationDescription | null | undefined
): boolean {
  if (a === b) return true;
  if (!a || !b) return false;
  return (
    a.resource === b.resource &&
    a.artboardName === b.artboardName &&
    a.animationName === b.animationName &&
    a.stateMachineName === b.stateMachineName &&
    a.autoplay === b.autoplay &&
    a.fit === b.fit &&
    a.alignment === b.alignment &&
    a.loop === b.loop
  );
}
