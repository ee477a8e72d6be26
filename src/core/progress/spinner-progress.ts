/**
 * Spinner Progress
 *
 * Renders enumeration progress as a @clack/prompts spinner: `<label> <done>/<total>`.
 */

import * as p from '@clack/prompts';
import type { ProgressSink, ProgressSinkFactory } from './types.js';

export interface SpinnerProgressOptions {
    /** Text shown before the counter (default: "Loading blobs") */
    label?: string;
}

export function createSpinnerProgress(options: SpinnerProgressOptions = {}): ProgressSinkFactory {
    const label = options.label ?? 'Loading blobs';

    return (total: number): ProgressSink => {
        const spinner = p.spinner();
        let done = 0;
        let closed = false;
        spinner.start(`${label} ${done}/${total}`);

        return {
            increment() {
                if (closed) return;
                done += 1;
                spinner.message(`${label} ${done}/${total}`);
            },
            close() {
                if (closed) return;
                closed = true;
                spinner.stop(`${label} ${done}/${total}`);
            },
        };
    };
}
