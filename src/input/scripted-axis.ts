import type { AxisValue, FrameTime } from 'types/game';
import { toAxisValue, type HorizontalAxis } from './contracts';

export type AxisScript = (frame: FrameTime) => number;

/** Axis driven by a function of the frame; used by the headless engine and tests. */
export const createScriptedAxis = (script: AxisScript): HorizontalAxis => ({
    read: (frame) => toAxisValue(script(frame)),
});

export const constantAxis = (value: AxisValue): HorizontalAxis => ({
    read: () => value,
});
