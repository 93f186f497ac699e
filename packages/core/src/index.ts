export * from './types';
export * from './description';

// Host adapter: binds engine views to a controller
export * from './anim/adapter';

// State sync controller and its building blocks
export * from './sync/controller';
export * from './sync/outcome';
export * from './sync/timings';
export * from './sync/logger';
export * from './sync/poll';
export * from './sync/valueSlot';
