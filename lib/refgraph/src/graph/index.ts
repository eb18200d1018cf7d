export { ObjectArena } from './object-arena';
export { CycleDetector } from './cycle-detector';
