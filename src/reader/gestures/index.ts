/**
 * Reader gesture controller
 */

export * from './types';
export * from './gesture-config';
export * from './tap-region';
export * from './scale-anchor';
export * from './offset-constraints';
export { GestureCoordinator, type GestureCoordinatorOptions } from './gesture-coordinator';
export * from './reading-gestures';
