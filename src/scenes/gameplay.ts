import type { EmberDodgeEventBus } from 'app/events';
import type { GameState } from 'app/game-state';
import type { Scene, SceneFactory, SceneRuntimeContext } from 'app/scene-manager';
import type { GameConfig } from 'config/game';
import { Hazard, type HazardBlueprint, type HazardSnapshot } from 'game/hazard';
import { HazardSpawner, type HazardSceneAccess, type SpawnerPhase } from 'game/hazard-spawner';
import { PlayerAgent, type PlayerSnapshot } from 'game/player-agent';
import type { SpawnRegistry } from 'game/spawn-registry';
import type { HorizontalAxis } from 'input/contracts';
import { createPhysicsWorld, type PhysicsWorldHandle } from 'physics/world';
import { computeVisibleBounds, createCamera, resolveCamera, type Camera, type VisibleBounds } from 'render/viewport';
import { rootLogger, type Logger } from 'util/log';
import type { RandomSource } from 'util/random';
import type { FrameTime, Vector2 } from 'types/game';

export const GAMEPLAY_SCENE = 'gameplay';

export interface GameplaySceneServices {
    readonly config: GameConfig;
    readonly gameState: GameState;
    readonly registry: SpawnRegistry<Hazard>;
    readonly input: HorizontalAxis;
    readonly random: RandomSource;
    readonly bus: EmberDodgeEventBus;
    /** Real-time clock reading; spawn delays are measured against it. */
    readonly realtime: () => number;
    readonly logger?: Logger;
}

export interface GameplaySnapshot {
    readonly scene: string;
    readonly isOver: boolean;
    readonly visible: VisibleBounds | null;
    readonly player: PlayerSnapshot | null;
    readonly hazards: readonly HazardSnapshot[];
    readonly spawnerPhase: SpawnerPhase;
}

export interface GameplayScene extends Scene {
    readonly snapshot: () => GameplaySnapshot;
    readonly player: () => PlayerAgent | null;
    readonly spawner: () => HazardSpawner | null;
    readonly hazards: () => readonly Hazard[];
}

export const createGameplayScene = (services: GameplaySceneServices): SceneFactory<GameplayScene> =>
    (context: SceneRuntimeContext): GameplayScene => {
        const { config, gameState, registry, bus } = services;
        const logger = (services.logger ?? rootLogger).child(context.sceneName);
        const cameras: Camera[] = [];
        const blueprints: HazardBlueprint[] = [];
        const hazards = new Set<Hazard>();
        const findCamera = () => resolveCamera(cameras);

        let physics: PhysicsWorldHandle | null = null;
        let player: PlayerAgent | null = null;
        let spawner: HazardSpawner | null = null;
        let nextHazardId = 1;
        let unsubscribeGameOver: (() => void) | null = null;

        const requirePhysics = (): PhysicsWorldHandle => {
            if (!physics) {
                throw new Error('Gameplay scene is not initialised');
            }
            return physics;
        };

        const instantiate = (blueprint: HazardBlueprint, position: Vector2): Hazard => {
            const hazard = new Hazard({
                id: `ember-${nextHazardId++}`,
                blueprint,
                position,
                gameState,
                physics: requirePhysics(),
                findCamera,
                tuning: config.hazard,
                logger,
            });

            hazards.add(hazard);
            hazard.onDestroyed.subscribe((event) => {
                hazards.delete(hazard);
                registry.delete(hazard);
                bus.publish('HazardCleared', {
                    hazardId: event.id,
                    cause: event.cause,
                    position: event.position,
                }, services.realtime());
            });
            hazard.start();
            return hazard;
        };

        const sceneAccess: HazardSceneAccess = {
            liveHazards: () => [...hazards],
            findInactiveByName: (name) => blueprints.find((candidate) => candidate.name === name && !candidate.active) ?? null,
            findInactiveBlueprint: () => blueprints.find((candidate) => !candidate.active) ?? null,
            instantiate,
        };

        const init = () => {
            cameras.push(createCamera(config.camera));
            blueprints.push({
                name: config.spawner.templateName,
                active: false,
                fallSpeed: config.hazard.defaultFallSpeed,
                visual: config.hazard.visual,
            });
            physics = createPhysicsWorld({ logger });

            player = new PlayerAgent({
                gameState,
                input: services.input,
                physics,
                findCamera,
                position: config.player.startPosition,
                moveSpeed: config.player.moveSpeed,
                visual: config.player.visual,
                fallbackVisualWidth: config.player.fallbackVisualWidth,
                tag: config.player.tag,
                logger,
            });
            player.start();

            const subscription = gameState.onGameOver.subscribe(() => {
                bus.publish('GameOver', {
                    playerX: player?.position.x ?? 0,
                    liveHazards: hazards.size,
                }, services.realtime());
            });
            unsubscribeGameOver = subscription.unsubscribe;

            spawner = new HazardSpawner({
                config: config.spawner,
                registry,
                scene: sceneAccess,
                random: services.random,
                findCamera,
                onSpawned: (record, hazard) => {
                    bus.publish('HazardSpawned', {
                        hazardId: record.hazardId,
                        index: record.index,
                        position: record.position,
                        fallSpeed: hazard.getFallSpeed(),
                    }, record.realtime);
                },
                logger,
            });
            spawner.start(services.realtime());
        };

        const update = (frame: FrameTime) => {
            player?.update(frame);
            for (const hazard of [...hazards]) {
                hazard.update(frame);
            }
            spawner?.update(frame);
            if (frame.deltaTime > 0) {
                physics?.step(frame.deltaTime * 1000);
            }
        };

        const destroy = () => {
            unsubscribeGameOver?.();
            unsubscribeGameOver = null;
            spawner?.destroy();
            spawner = null;
            [...hazards].forEach((hazard) => hazard.destroy('scene-unload'));
            hazards.clear();
            player?.destroy();
            player = null;
            physics?.dispose();
            physics = null;
            cameras.length = 0;
            blueprints.length = 0;
        };

        const snapshot = (): GameplaySnapshot => ({
            scene: context.sceneName,
            isOver: gameState.isOver,
            visible: computeVisibleBounds(findCamera()),
            player: player?.snapshot() ?? null,
            hazards: [...hazards].map((hazard) => hazard.snapshot()),
            spawnerPhase: spawner?.phase ?? 'idle',
        });

        return {
            init,
            update,
            destroy,
            snapshot,
            player: () => player,
            spawner: () => spawner,
            hazards: () => [...hazards],
        };
    };
