import { describe, expect, it } from 'vitest';
import { createSimulationClock } from 'app/clock';

describe('createSimulationClock', () => {
    it('scales game time but not real time', () => {
        const clock = createSimulationClock();

        clock.advance(0.5);
        clock.setTimeScale(0);
        const halted = clock.advance(0.25);

        expect(halted).toEqual({
            frame: 2,
            deltaTime: 0,
            unscaledDeltaTime: 0.25,
            time: 0.5,
            realtime: 0.75,
            timeScale: 0,
        });
        expect(clock.realtime()).toBe(0.75);
        expect(clock.current()).toBe(halted);
    });

    it('clamps negative scales and resets non-finite ones', () => {
        const clock = createSimulationClock();

        clock.setTimeScale(-2);
        expect(clock.getTimeScale()).toBe(0);

        clock.setTimeScale(Number.NaN);
        expect(clock.getTimeScale()).toBe(1);
    });

    it('treats invalid deltas as empty frames', () => {
        const clock = createSimulationClock();

        const frame = clock.advance(-1);

        expect(frame.frame).toBe(1);
        expect(frame.unscaledDeltaTime).toBe(0);
        expect(frame.realtime).toBe(0);
    });
});
