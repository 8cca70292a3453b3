/**
 * Input contracts shared by the player agent and the input back ends.
 */

import type { AxisValue, FrameTime } from 'types/game';

export interface HorizontalAxis {
    /**
     * Current horizontal intent, sampled once per frame.
     * @param frame - Timing of the frame doing the sampling (scripted sources use it)
     */
    read(frame: FrameTime): AxisValue;
}

export interface RestartRequestSource {
    /** Registers a callback fired when the player asks to restart. Returns an unsubscribe function. */
    onRestartRequested(listener: () => void): () => void;
}

export const toAxisValue = (value: number): AxisValue => {
    if (!Number.isFinite(value) || value === 0) {
        return 0;
    }
    return value > 0 ? 1 : -1;
};
