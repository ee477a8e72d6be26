export { noopProgress } from './noop-progress.js';
export { createSpinnerProgress } from './spinner-progress.js';
export type { SpinnerProgressOptions } from './spinner-progress.js';
export type { ProgressSink, ProgressSinkFactory } from './types.js';
