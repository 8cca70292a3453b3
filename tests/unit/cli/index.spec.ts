import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('cli/simulate', () => ({
    runHeadlessSimulation: vi.fn(),
}));

import { CliUsageError, USAGE, createCli, parseSimulateArgs } from 'cli/index';
import { runHeadlessSimulation, type SimulationResult } from 'cli/simulate';

const runMock = vi.mocked(runHeadlessSimulation);

const sampleResult: SimulationResult = {
    ok: true,
    seed: 5,
    bot: 'sweep',
    frames: 120,
    durationMs: 1000,
    runs: [{ run: 1, survivedMs: 1000, endedBy: 'time-limit' }],
    gameOvers: 0,
    restarts: 0,
    hazards: { spawned: 2, cleared: 1, clearedByCause: { 'out-of-bounds': 1, cleanup: 0, 'scene-unload': 0 } },
    finalPlayerX: 1.5,
};

describe('parseSimulateArgs', () => {
    it('reads every supported flag', () => {
        expect(
            parseSimulateArgs(['--seed', '5', '--duration', '2.5', '--bot', 'sweep', '--restarts', '3', '--count', '4', '--telemetry']),
        ).toEqual({ seed: 5, durationSec: 2.5, bot: 'sweep', restarts: 3, count: 4, telemetry: true });
    });

    it('returns an empty request without flags', () => {
        expect(parseSimulateArgs([])).toEqual({});
    });

    it('rejects malformed values', () => {
        expect(() => parseSimulateArgs(['--seed', 'abc'])).toThrow('--seed expects an integer');
        expect(() => parseSimulateArgs(['--duration', '0'])).toThrow('--duration expects a positive number');
        expect(() => parseSimulateArgs(['--restarts', '-1'])).toThrow('--restarts must not be negative');
        expect(() => parseSimulateArgs(['--bot'])).toThrow(CliUsageError);
        expect(() => parseSimulateArgs(['--fast'])).toThrow('Unknown option: --fast');
    });
});

describe('createCli', () => {
    let errors: unknown[][];
    let lines: unknown[][];

    beforeEach(() => {
        errors = [];
        lines = [];
        vi.spyOn(console, 'error').mockImplementation((...parts: unknown[]) => {
            errors.push(parts);
        });
        vi.spyOn(console, 'log').mockImplementation((...parts: unknown[]) => {
            lines.push(parts);
        });
    });

    it('prints usage for an unknown command', async () => {
        await expect(createCli(['play']).execute()).resolves.toBe(1);

        expect(errors).toEqual([[USAGE]]);
        expect(runMock).not.toHaveBeenCalled();
    });

    it('prints the parse error with usage', async () => {
        await expect(createCli(['simulate', '--bot', 'fly']).execute()).resolves.toBe(1);

        expect(errors).toEqual([[`--bot expects one of idle, sweep, dodge\n${USAGE}`]]);
    });

    it('prints the simulation result as a single JSON line', async () => {
        runMock.mockResolvedValue(sampleResult);

        await expect(createCli(['simulate', '--seed', '5', '--bot', 'sweep']).execute()).resolves.toBe(0);

        expect(runMock).toHaveBeenCalledWith({ seed: 5, bot: 'sweep' });
        expect(lines).toEqual([[JSON.stringify(sampleResult)]]);
        expect(errors).toEqual([]);
    });

    it('reports a failed simulation', async () => {
        runMock.mockRejectedValue(new Error('boom'));

        await expect(createCli(['simulate']).execute()).resolves.toBe(1);

        expect(errors).toEqual([['Simulation failed: boom']]);
        expect(lines).toEqual([]);
    });
});
