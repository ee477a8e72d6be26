import type { ProgressSink, ProgressSinkFactory } from './types.js';

const NOOP_SINK: ProgressSink = {
    increment: () => undefined,
    close: () => undefined,
};

export const noopProgress: ProgressSinkFactory = () => NOOP_SINK;
