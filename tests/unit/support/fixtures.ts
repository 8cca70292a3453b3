import { createSimulationClock, type SimulationClock } from 'app/clock';
import { createGameState, type GameState } from 'app/game-state';
import { createLogger, type Logger, type LogEntry } from 'util/log';
import { createCamera, type Camera } from 'render/viewport';
import type { FrameTime } from 'types/game';

export const makeFrame = (overrides: Partial<FrameTime> = {}): FrameTime => ({
    frame: 1,
    deltaTime: 0.1,
    unscaledDeltaTime: 0.1,
    time: 0.1,
    realtime: 0.1,
    timeScale: 1,
    ...overrides,
});

export const makeCamera = (overrides: Partial<Camera> = {}): Camera => ({
    ...createCamera({ orthographic: true, orthographicSize: 5, aspect: 2, position: { x: 0, y: 0 } }),
    ...overrides,
});

export interface RecordingLogger {
    readonly logger: Logger;
    readonly entries: LogEntry[];
}

export const createRecordingLogger = (): RecordingLogger => {
    const entries: LogEntry[] = [];
    const logger = createLogger('test', {
        writer: (entry) => {
            entries.push(entry);
        },
        now: () => 0,
    });
    return { logger, entries };
};

export interface GameStateFixture {
    readonly clock: SimulationClock;
    readonly gameState: GameState;
    readonly reloads: () => number;
}

export const createGameStateFixture = (logger?: Logger): GameStateFixture => {
    const clock = createSimulationClock();
    let reloads = 0;
    const gameState = createGameState({
        clock,
        reloadScene: () => {
            reloads += 1;
        },
        logger: logger ?? createRecordingLogger().logger,
    });
    return { clock, gameState, reloads: () => reloads };
};
