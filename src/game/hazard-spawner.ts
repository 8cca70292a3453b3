import type { SpawnerConfig } from 'config/game';
import { computeVisibleBounds, type CameraLookup } from 'render/viewport';
import { rootLogger, type Logger } from 'util/log';
import { sampleRange, type RandomSource } from 'util/random';
import type { FrameTime, Vector2 } from 'types/game';
import type { Hazard, HazardBlueprint } from './hazard';
import type { SpawnRegistry } from './spawn-registry';

export type SpawnerPhase = 'idle' | 'initializing' | 'spawning' | 'done';

/** Scene operations the spawner needs; the gameplay scene provides them. */
export interface HazardSceneAccess {
    readonly liveHazards: () => readonly Hazard[];
    readonly findInactiveByName: (name: string) => HazardBlueprint | null;
    readonly findInactiveBlueprint: () => HazardBlueprint | null;
    /** Creates, positions and activates a hazard instance from a blueprint. */
    readonly instantiate: (blueprint: HazardBlueprint, position: Vector2) => Hazard;
}

export interface SpawnRegion {
    readonly minX: number;
    readonly maxX: number;
    readonly height: number;
    readonly source: 'viewport' | 'manual';
}

export interface HazardSpawnerOptions {
    readonly config: SpawnerConfig;
    readonly registry: SpawnRegistry<Hazard>;
    readonly scene: HazardSceneAccess;
    readonly random: RandomSource;
    readonly findCamera: CameraLookup;
    readonly template?: HazardBlueprint | null;
    readonly onSpawned?: (record: SpawnRecord, hazard: Hazard) => void;
    readonly logger?: Logger;
}

/** Pending spawn, checked once per tick against the real-time clock. */
interface SpawnSchedule {
    nextSpawnIndex: number;
    nextSpawnDueAt: number;
}

export interface SpawnRecord {
    readonly hazardId: string;
    readonly index: number;
    readonly position: Vector2;
    readonly realtime: number;
}

export class HazardSpawner {
    private readonly options: HazardSpawnerOptions;
    private readonly logger: Logger;
    private currentPhase: SpawnerPhase = 'idle';
    private template: HazardBlueprint | null;
    private region: SpawnRegion | null = null;
    private schedule: SpawnSchedule | null = null;
    private readonly history: SpawnRecord[] = [];
    private torn = false;

    constructor(options: HazardSpawnerOptions) {
        this.options = options;
        this.logger = (options.logger ?? rootLogger).child('spawner');
        this.template = options.template ?? null;
    }

    get phase(): SpawnerPhase {
        return this.currentPhase;
    }

    get spawnRegion(): SpawnRegion | null {
        return this.region;
    }

    get spawned(): readonly SpawnRecord[] {
        return this.history;
    }

    get hazardTemplate(): HazardBlueprint | null {
        return this.template;
    }

    /**
     * Runs the initialization sequence unless this session already spawned. The
     * first hazard appears immediately; later ones are released by `update`.
     */
    start(realtime: number): void {
        if (this.torn || this.currentPhase !== 'idle') {
            return;
        }

        if (this.options.registry.hasSpawned) {
            this.logger.debug('Spawn run already recorded for this session; staying idle');
            return;
        }

        this.currentPhase = 'initializing';
        this.cleanupExistingHazards();
        this.template ??= this.findTemplate();
        this.region = this.computeSpawnRegion();

        if (!this.template) {
            this.logger.warn('No hazard template found; nothing will spawn');
            this.currentPhase = 'done';
            return;
        }

        this.beginSpawnRun(realtime);
        this.options.registry.hasSpawned = true;
    }

    /**
     * Starts a spawn run. Does nothing while hazards from an earlier run are still
     * live. Returns whether a run started.
     */
    beginSpawnRun(realtime: number): boolean {
        if (this.torn || !this.template || !this.region) {
            return false;
        }

        if (this.options.registry.size > 0) {
            this.logger.debug('Live hazards present; skipping spawn run', { live: this.options.registry.size });
            return false;
        }

        const count = Math.max(0, Math.floor(this.options.config.count));
        if (count === 0) {
            this.currentPhase = 'done';
            return true;
        }

        this.currentPhase = 'spawning';
        this.schedule = { nextSpawnIndex: 0, nextSpawnDueAt: realtime };
        this.releaseDueSpawns(realtime);
        return true;
    }

    update(frame: FrameTime): void {
        if (this.currentPhase !== 'spawning') {
            return;
        }
        this.releaseDueSpawns(frame.realtime);
    }

    /** Clears the session's spawn flag and registry and abandons any pending spawn. */
    destroy(): void {
        if (this.torn) {
            return;
        }
        this.torn = true;
        this.schedule = null;
        this.options.registry.reset();
        if (this.currentPhase === 'spawning') {
            this.logger.debug('Pending spawn run abandoned');
        }
    }

    private releaseDueSpawns(realtime: number): void {
        const schedule = this.schedule;
        if (!schedule || realtime < schedule.nextSpawnDueAt) {
            return;
        }

        const count = Math.floor(this.options.config.count);
        this.spawnSingle(schedule.nextSpawnIndex, realtime);
        schedule.nextSpawnIndex += 1;

        if (schedule.nextSpawnIndex >= count) {
            this.schedule = null;
            this.currentPhase = 'done';
            this.logger.info('Spawn run complete', { spawned: count });
            return;
        }

        const { delayMin, delayMax } = this.options.config;
        schedule.nextSpawnDueAt = realtime + sampleRange(this.options.random, delayMin, delayMax);
    }

    private spawnSingle(index: number, realtime: number): void {
        const template = this.template;
        const region = this.region;
        if (!template || !region) {
            return;
        }

        const position = {
            x: sampleRange(this.options.random, region.minX, region.maxX),
            y: region.height,
        };
        const hazard = this.options.scene.instantiate(template, position);
        this.options.registry.add(hazard);
        hazard.setFallSpeed(this.options.config.fallSpeed);
        const record: SpawnRecord = { hazardId: hazard.id, index, position, realtime };
        this.history.push(record);
        this.options.onSpawned?.(record, hazard);
    }

    private cleanupExistingHazards(): void {
        const leftovers = this.options.scene.liveHazards();
        leftovers.forEach((hazard) => hazard.destroy('cleanup'));
        if (leftovers.length > 0) {
            this.logger.debug('Removed leftover hazards', { count: leftovers.length });
        }
        this.options.registry.clear();
    }

    private findTemplate(): HazardBlueprint | null {
        const named = this.options.scene.findInactiveByName(this.options.config.templateName);
        if (named) {
            return named;
        }
        return this.options.scene.findInactiveBlueprint();
    }

    private computeSpawnRegion(): SpawnRegion {
        const { config } = this.options;
        const visible = config.useViewportBounds ? computeVisibleBounds(this.options.findCamera()) : null;

        if (visible) {
            return {
                minX: visible.left,
                maxX: visible.right,
                height: visible.top + config.viewportTopOffset,
                source: 'viewport',
            };
        }

        return {
            minX: config.minX,
            maxX: config.maxX,
            height: config.spawnHeight,
            source: 'manual',
        };
    }
}
