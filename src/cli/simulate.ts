import type { AnyEventEnvelope } from 'app/events';
import { resolveGameConfig } from 'config/game';
import { createLogger, formatLogLine, type Logger, type LogWriter } from 'util/log';
import { runHeadlessEngine, type BotName, type HeadlessSimulationResult, type RunSummary } from './headless-engine';

export interface SimulationInput {
    readonly seed?: number;
    readonly durationSec?: number;
    readonly bot?: BotName;
    readonly restarts?: number;
    /** Hazards per spawn run. */
    readonly count?: number;
    readonly telemetry?: boolean;
}

export interface SimulationResult {
    readonly ok: true;
    readonly seed: number;
    readonly bot: BotName;
    readonly frames: number;
    readonly durationMs: number;
    readonly runs: readonly RunSummary[];
    readonly gameOvers: number;
    readonly restarts: number;
    readonly hazards: HeadlessSimulationResult['hazards'];
    readonly finalPlayerX: number | null;
    readonly telemetry?: {
        readonly events: readonly AnyEventEnvelope[];
    };
}

export const DEFAULT_SEED = 1;
export const DEFAULT_DURATION_SEC = 60;
export const DEFAULT_BOT: BotName = 'dodge';

/** Log lines go to stderr so stdout carries only the JSON result. */
const stderrWriter: LogWriter = (entry) => {
    const context = entry.context && Object.keys(entry.context).length > 0 ? ` ${JSON.stringify(entry.context)}` : '';
    process.stderr.write(`${formatLogLine(entry)}${context}\n`);
};

export const createCliLogger = (): Logger => createLogger('ember-dodge', { writer: stderrWriter, minLevel: 'warn' });

const mapResult = (source: HeadlessSimulationResult, telemetryRequested: boolean): SimulationResult => ({
    ok: true,
    seed: source.seed,
    bot: source.bot,
    frames: source.frames,
    durationMs: source.durationMs,
    runs: source.runs,
    gameOvers: source.gameOvers,
    restarts: source.restarts,
    hazards: source.hazards,
    finalPlayerX: source.finalPlayerX,
    telemetry: telemetryRequested ? { events: source.events } : undefined,
});

export const runHeadlessSimulation = async (
    input: SimulationInput,
    logger: Logger = createCliLogger(),
): Promise<SimulationResult> => {
    const seed = input.seed ?? DEFAULT_SEED;
    const durationSec = input.durationSec ?? DEFAULT_DURATION_SEC;
    if (!(durationSec > 0) || !Number.isFinite(durationSec)) {
        throw new RangeError('duration must be a positive number of seconds');
    }
    const telemetryRequested = input.telemetry ?? false;
    const config = resolveGameConfig(input.count === undefined ? {} : { spawner: { count: input.count } });

    const result = runHeadlessEngine({
        seed,
        durationMs: durationSec * 1000,
        bot: input.bot ?? DEFAULT_BOT,
        restarts: input.restarts ?? 0,
        telemetry: telemetryRequested,
        config,
        logger,
    });

    return mapResult(result, telemetryRequested);
};
