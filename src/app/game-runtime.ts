import { resolveGameConfig, type GameConfig } from 'config/game';
import type { Hazard } from 'game/hazard';
import { createSpawnRegistry, type SpawnRegistry } from 'game/spawn-registry';
import type { HorizontalAxis } from 'input/contracts';
import { createGameplayScene, GAMEPLAY_SCENE, type GameplayScene, type GameplaySnapshot } from 'scenes/gameplay';
import { rootLogger, type Logger } from 'util/log';
import { createSessionRandom, type SessionRandom } from 'util/random';
import type { FrameTime } from 'types/game';
import { createSimulationClock, type SimulationClock } from './clock';
import { createEventBus, type EmberDodgeEventBus } from './events';
import { createGameState, type GameState } from './game-state';
import { FixedStepLoop, type LoopOptions } from './loop';
import { createSceneManager, type SceneManagerHandle } from './scene-manager';

const GAME_STATE_KEY = 'game-state';
const SPAWN_REGISTRY_KEY = 'spawn-registry';

export interface GameRuntimeOptions {
    readonly input: HorizontalAxis;
    readonly config?: GameConfig;
    readonly seed?: number;
    readonly bus?: EmberDodgeEventBus;
    /** Scheduling overrides for the browser loop (`raf`, `now`, step caps). */
    readonly loop?: Omit<LoopOptions, 'fixedDelta'>;
    readonly onRender?: (snapshot: GameplaySnapshot | null, alpha: number) => void;
    readonly logger?: Logger;
}

export interface GameRuntimeHandle {
    readonly config: GameConfig;
    readonly clock: SimulationClock;
    readonly bus: EmberDodgeEventBus;
    readonly random: SessionRandom;
    readonly scenes: SceneManagerHandle;
    readonly gameState: GameState;
    readonly registry: SpawnRegistry<Hazard>;
    start(): void;
    stop(): void;
    isRunning(): boolean;
    /** Advances one frame by a real (unscaled) delta in seconds. */
    step(realDeltaSeconds: number): FrameTime;
    /** Restarts only while the game is over. Returns whether a restart was issued. */
    requestRestart(): boolean;
    scene(): GameplayScene | null;
    snapshot(): GameplaySnapshot | null;
    destroy(): void;
}

export const createGameRuntime = (options: GameRuntimeOptions): GameRuntimeHandle => {
    const logger = (options.logger ?? rootLogger).child('runtime');
    const config = options.config ?? resolveGameConfig();
    const clock = createSimulationClock();
    const bus = options.bus ?? createEventBus({ now: clock.realtime });
    const random = createSessionRandom(options.seed);
    const scenes = createSceneManager({ logger });

    const gameState = scenes.persistent(GAME_STATE_KEY, () =>
        createGameState({
            clock,
            reloadScene: () => scenes.requestReload(),
            logger,
        }),
    );
    const registry = scenes.persistent(SPAWN_REGISTRY_KEY, () => createSpawnRegistry<Hazard>());

    let restarts = 0;
    let destroyed = false;
    let activeScene: GameplayScene | null = null;

    const restartSubscription = gameState.onRestart.subscribe(() => {
        restarts += 1;
        bus.publish('GameRestarted', { restarts }, clock.realtime());
    });

    const buildGameplay = createGameplayScene({
        config,
        gameState,
        registry,
        input: options.input,
        random: random.source,
        bus,
        realtime: clock.realtime,
        logger,
    });

    scenes.register(GAMEPLAY_SCENE, (context) => {
        const scene = buildGameplay(context);
        activeScene = scene;
        return scene;
    });
    scenes.switch(GAMEPLAY_SCENE);
    logger.info('Runtime ready', { seed: random.seed() });

    const step = (realDeltaSeconds: number): FrameTime => {
        const frame = clock.advance(realDeltaSeconds);
        if (!destroyed) {
            scenes.update(frame);
        }
        return frame;
    };

    const snapshot = (): GameplaySnapshot | null => (destroyed ? null : activeScene?.snapshot() ?? null);

    const loop = new FixedStepLoop(
        (stepSeconds) => {
            step(stepSeconds);
        },
        (alpha) => {
            options.onRender?.(snapshot(), alpha);
        },
        {
            maxStepsPerFrame: config.loop.maxStepsPerFrame,
            ...options.loop,
            fixedDelta: config.loop.fixedDelta,
        },
    );

    return {
        config,
        clock,
        bus,
        random,
        scenes,
        gameState,
        registry,
        start() {
            if (destroyed) {
                throw new Error('Game runtime has been destroyed');
            }
            loop.start();
        },
        stop: () => loop.stop(),
        isRunning: () => loop.isRunning(),
        step,
        requestRestart() {
            if (!gameState.isOver) {
                return false;
            }
            gameState.restartGame();
            return true;
        },
        scene: () => activeScene,
        snapshot,
        destroy() {
            if (destroyed) {
                return;
            }
            destroyed = true;
            loop.stop();
            restartSubscription.unsubscribe();
            scenes.destroy();
            gameState.dispose();
            activeScene = null;
            logger.info('Runtime destroyed', { restarts });
        },
    };
};
