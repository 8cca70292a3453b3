import { createEventBus, type AnyEventEnvelope } from 'app/events';
import { createGameRuntime, type GameRuntimeHandle } from 'app/game-runtime';
import { resolveGameConfig, type GameConfig } from 'config/game';
import type { HazardDestroyCause, HazardSnapshot } from 'game/hazard';
import type { PlayerSnapshot } from 'game/player-agent';
import { createScriptedAxis } from 'input/scripted-axis';
import { rootLogger, type Logger } from 'util/log';

export type BotName = 'idle' | 'sweep' | 'dodge';

export const BOT_NAMES: readonly BotName[] = ['idle', 'sweep', 'dodge'];

export const isBotName = (value: unknown): value is BotName =>
    typeof value === 'string' && BOT_NAMES.some((name) => name === value);

/** What a bot may look at before choosing a direction. */
export interface BotView {
    readonly player: PlayerSnapshot | null;
    readonly hazards: readonly HazardSnapshot[];
}

export type BotPolicy = (view: BotView) => number;

const EDGE_MARGIN = 0.05;
const DANGER_HALF_WIDTH = 1.2;
const CENTER_DEADZONE = 0.5;

const createSweepBot = (): BotPolicy => {
    let direction = 1;
    return ({ player }) => {
        const bounds = player?.bounds;
        if (!player || !bounds) {
            return direction;
        }
        if (player.position.x >= bounds.maxX - EDGE_MARGIN) {
            direction = -1;
        } else if (player.position.x <= bounds.minX + EDGE_MARGIN) {
            direction = 1;
        }
        return direction;
    };
};

/** Steps away from the lowest hazard still above the player and in its column. */
const createDodgeBot = (): BotPolicy => ({ player, hazards }) => {
    if (!player) {
        return 0;
    }

    const { x, y } = player.position;
    const threat = hazards
        .filter((hazard) => hazard.position.y > y && Math.abs(hazard.position.x - x) < DANGER_HALF_WIDTH)
        .reduce<HazardSnapshot | null>((lowest, hazard) =>
            lowest === null || hazard.position.y < lowest.position.y ? hazard : lowest, null);

    if (!threat) {
        if (Math.abs(x) <= CENTER_DEADZONE) {
            return 0;
        }
        return x > 0 ? -1 : 1;
    }

    const away = threat.position.x > x ? -1 : 1;
    const bounds = player.bounds;
    if (bounds && ((away < 0 && x <= bounds.minX + EDGE_MARGIN) || (away > 0 && x >= bounds.maxX - EDGE_MARGIN))) {
        return -away;
    }
    return away;
};

export const createBot = (name: BotName): BotPolicy => {
    switch (name) {
        case 'idle':
            return () => 0;
        case 'sweep':
            return createSweepBot();
        case 'dodge':
            return createDodgeBot();
    }
};

export interface HeadlessSimulationOptions {
    readonly seed: number;
    readonly durationMs: number;
    readonly bot: BotName;
    /** Restarts allowed after a game over before the simulation stops. */
    readonly restarts: number;
    readonly telemetry?: boolean;
    readonly config?: GameConfig;
    readonly logger?: Logger;
}

export type RunEnding = 'game-over' | 'time-limit';

export interface RunSummary {
    readonly run: number;
    readonly survivedMs: number;
    readonly endedBy: RunEnding;
}

export interface HeadlessSimulationResult {
    readonly seed: number;
    readonly bot: BotName;
    readonly frames: number;
    readonly durationMs: number;
    readonly runs: readonly RunSummary[];
    readonly gameOvers: number;
    readonly restarts: number;
    readonly hazards: {
        readonly spawned: number;
        readonly cleared: number;
        readonly clearedByCause: Record<HazardDestroyCause, number>;
    };
    readonly finalPlayerX: number | null;
    readonly events: readonly AnyEventEnvelope[];
}

const toMs = (seconds: number): number => Math.round(seconds * 1000);

const readView = (runtime: GameRuntimeHandle | null): BotView => {
    const snapshot = runtime?.snapshot() ?? null;
    return {
        player: snapshot?.player ?? null,
        hazards: snapshot?.hazards ?? [],
    };
};

export const runHeadlessEngine = (options: HeadlessSimulationOptions): HeadlessSimulationResult => {
    const config = options.config ?? resolveGameConfig();
    const logger = (options.logger ?? rootLogger).child('headless');
    const stepSeconds = config.loop.fixedDelta;
    const totalSteps = Math.max(0, Math.ceil(options.durationMs / (stepSeconds * 1000)));
    const maxRestarts = Math.max(0, Math.floor(options.restarts));

    let realtime = 0;
    const bus = createEventBus({ now: () => realtime });
    const events: AnyEventEnvelope[] = [];
    if (options.telemetry) {
        bus.subscribeAll((event) => {
            events.push(event);
        });
    }

    let spawned = 0;
    const clearedByCause: Record<HazardDestroyCause, number> = {
        'out-of-bounds': 0,
        cleanup: 0,
        'scene-unload': 0,
    };
    bus.subscribe('HazardSpawned', () => {
        spawned += 1;
    });
    bus.subscribe('HazardCleared', (event) => {
        clearedByCause[event.payload.cause] += 1;
    });

    const policy = createBot(options.bot);
    let runtime: GameRuntimeHandle | null = null;
    const input = createScriptedAxis(() => policy(readView(runtime)));
    runtime = createGameRuntime({
        input,
        config,
        seed: options.seed,
        bus,
        logger: options.logger,
    });

    const runs: RunSummary[] = [];
    let runStartedAt = 0;
    let gameOvers = 0;
    let restarts = 0;
    let frames = 0;
    let stopped = false;

    try {
        while (frames < totalSteps && !stopped) {
            const frame = runtime.step(stepSeconds);
            realtime = frame.realtime;
            frames += 1;

            if (!runtime.gameState.isOver) {
                continue;
            }

            gameOvers += 1;
            runs.push({ run: runs.length + 1, survivedMs: toMs(realtime - runStartedAt), endedBy: 'game-over' });

            if (restarts >= maxRestarts) {
                stopped = true;
                continue;
            }

            restarts += 1;
            runtime.gameState.restartGame();
            runStartedAt = realtime;
        }

        if (!stopped) {
            runs.push({ run: runs.length + 1, survivedMs: toMs(realtime - runStartedAt), endedBy: 'time-limit' });
        }

        const finalPlayerX = runtime.snapshot()?.player?.position.x ?? null;
        logger.info('Simulation finished', { frames, gameOvers, restarts });

        return {
            seed: runtime.random.seed(),
            bot: options.bot,
            frames,
            durationMs: toMs(realtime),
            runs,
            gameOvers,
            restarts,
            hazards: {
                spawned,
                cleared: clearedByCause['out-of-bounds'] + clearedByCause.cleanup + clearedByCause['scene-unload'],
                clearedByCause: { ...clearedByCause },
            },
            finalPlayerX,
            events: [...events],
        };
    } finally {
        runtime.destroy();
        bus.clear();
    }
};
