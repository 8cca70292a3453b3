import { describe, expect, it, vi } from 'vitest';
import { createCliLogger, runHeadlessSimulation } from 'cli/simulate';
import { createRecordingLogger } from '../support/fixtures';

describe('runHeadlessSimulation', () => {
    it('fills in the defaults and omits telemetry unless asked', async () => {
        const result = await runHeadlessSimulation({ durationSec: 0.1, count: 0 }, createRecordingLogger().logger);

        expect(result.ok).toBe(true);
        expect(result.seed).toBe(1);
        expect(result.bot).toBe('dodge');
        expect(result.frames).toBe(12);
        expect(result.restarts).toBe(0);
        expect(result.telemetry).toBeUndefined();
    });

    it('attaches the event log when telemetry is requested', async () => {
        const result = await runHeadlessSimulation(
            { seed: 9, durationSec: 0.05, bot: 'idle', count: 1, telemetry: true },
            createRecordingLogger().logger,
        );

        expect(result.telemetry?.events.map((event) => event.type)).toEqual(['HazardSpawned']);
        expect(result.hazards.spawned).toBe(1);
        expect(result.seed).toBe(9);
    });

    it('rejects a non-positive duration', async () => {
        await expect(runHeadlessSimulation({ durationSec: 0 }, createRecordingLogger().logger)).rejects.toThrow(RangeError);
    });

    it('rejects a negative spawn count through config validation', async () => {
        await expect(
            runHeadlessSimulation({ durationSec: 1, count: -1 }, createRecordingLogger().logger),
        ).rejects.toThrow('spawner.count must not be negative');
    });
});

describe('createCliLogger', () => {
    it('writes warnings to stderr and drops info lines', () => {
        const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
        const logger = createCliLogger();

        logger.info('quiet');
        logger.warn('loud', { frames: 3 });

        expect(write).toHaveBeenCalledTimes(1);
        expect(String(write.mock.calls[0]?.[0])).toMatch(/\[WARN\]\[ember-dodge\] loud \{"frames":3\}\n$/);
    });
});
