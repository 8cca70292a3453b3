import type { FrameTime } from 'types/game';

export interface TimeScaleControl {
    readonly getTimeScale: () => number;
    readonly setTimeScale: (scale: number) => void;
}

export interface SimulationClock extends TimeScaleControl {
    /** Advances by a real (unscaled) delta and returns the timing for the new frame. */
    readonly advance: (realDeltaSeconds: number) => FrameTime;
    readonly current: () => FrameTime;
    readonly realtime: () => number;
}

const sanitizeDelta = (value: number): number => (Number.isFinite(value) && value > 0 ? value : 0);

export const createSimulationClock = (): SimulationClock => {
    let timeScale = 1;
    let frame = 0;
    let time = 0;
    let realtime = 0;
    let last: FrameTime = {
        frame: 0,
        deltaTime: 0,
        unscaledDeltaTime: 0,
        time: 0,
        realtime: 0,
        timeScale,
    };

    const setTimeScale = (scale: number) => {
        timeScale = Number.isFinite(scale) ? Math.max(0, scale) : 1;
    };

    const advance = (realDeltaSeconds: number): FrameTime => {
        const unscaledDeltaTime = sanitizeDelta(realDeltaSeconds);
        const deltaTime = unscaledDeltaTime * timeScale;
        frame += 1;
        realtime += unscaledDeltaTime;
        time += deltaTime;
        last = {
            frame,
            deltaTime,
            unscaledDeltaTime,
            time,
            realtime,
            timeScale,
        };
        return last;
    };

    return {
        getTimeScale: () => timeScale,
        setTimeScale,
        advance,
        current: () => last,
        realtime: () => realtime,
    };
};
