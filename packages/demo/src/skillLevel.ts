import type { StateSyncController, SyncTimings } from '@rive-sync/core';

// skills.riv from the Rive sample app; ownership and rights belong to Rive.
// https://github.com/rive-app/rive-android/blob/master/app/src/main/res/raw/skills.riv
export const SKILLS_RESOURCE = '/skills.riv';
export const SKILLS_ARTBOARD = 'New Artboard';
export const SKILLS_STATE_MACHINE = "Designer's Test";
export const LEVEL_INPUT = 'Level';

// Nothing is loaded before the .riv file and the runtime's WASM have been
// fetched, which takes seconds on a cold page load.
export const SKILLS_TIMINGS = {
  viewTimeoutMs: 10_000,
  lookupTimeoutMs: 10_000,
} satisfies Partial<SyncTimings>;

/** The presentation requested by the app. */
export type SkillLevel = 'beginner' | 'intermediate' | 'advanced';

/** The state the animation reports having reached. */
export type SkillState = 'Beginner' | 'Intermediate' | 'Advanced';

const LEVEL_VALUES: Record<SkillLevel, number> = {
  beginner: 0,
  intermediate: 1,
  advanced: 2,
};

const SKILL_STATES: readonly SkillState[] = [
  'Beginner',
  'Intermediate',
  'Advanced',
];

export function nextSkillLevel(level: SkillLevel): SkillLevel {
  switch (level) {
    case 'beginner':
      return 'intermediate';
    case 'intermediate':
      return 'advanced';
    case 'advanced':
      return 'beginner';
  }
}

export function skillStateFromName(stateName: string): SkillState | null {
  return SKILL_STATES.find((state) => state === stateName) ?? null;
}

export async function applySkillLevel(
  controller: StateSyncController,
  level: SkillLevel,
  signal?: AbortSignal
): Promise<boolean> {
  // Wait until the state machines are loaded
  await controller.isReadyAndPlaying();
  if (signal?.aborted) return false;

  // Without play() first, setting the input is overridden by the default state
  await controller.play(SKILLS_STATE_MACHINE);
  if (signal?.aborted) return false;

  return controller.setNumber(
    SKILLS_STATE_MACHINE,
    LEVEL_INPUT,
    LEVEL_VALUES[level],
    { signal }
  );
}
