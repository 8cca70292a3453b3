import type { Vector2 } from 'types/game';

export interface CameraConfig {
    readonly orthographic: boolean;
    /** Half of the visible height in world units. */
    readonly orthographicSize: number;
    readonly aspect: number;
    readonly position: Vector2;
}

export interface PlayerConfig {
    readonly moveSpeed: number;
    readonly startPosition: Vector2;
    readonly visual: { readonly width: number; readonly height: number } | null;
    readonly fallbackVisualWidth: number;
    readonly tag: string;
}

export interface HazardConfig {
    readonly defaultFallSpeed: number;
    readonly boundaryOffset: number;
    readonly fallbackBottomBoundary: number;
    readonly defaultRadius: number;
    readonly visual: { readonly width: number; readonly height: number } | null;
}

export interface SpawnerConfig {
    readonly count: number;
    readonly delayMin: number;
    readonly delayMax: number;
    readonly fallSpeed: number;
    readonly useViewportBounds: boolean;
    readonly minX: number;
    readonly maxX: number;
    readonly spawnHeight: number;
    readonly viewportTopOffset: number;
    readonly templateName: string;
}

export interface LoopConfig {
    readonly fixedDelta: number;
    readonly maxStepsPerFrame: number;
}

export interface GameConfig {
    readonly camera: CameraConfig;
    readonly player: PlayerConfig;
    readonly hazard: HazardConfig;
    readonly spawner: SpawnerConfig;
    readonly loop: LoopConfig;
}

export const gameConfig = {
    camera: {
        orthographic: true,
        orthographicSize: 5,
        aspect: 16 / 9,
        position: { x: 0, y: 0 },
    },
    player: {
        moveSpeed: 5,
        startPosition: { x: 0, y: -4 },
        visual: { width: 1, height: 1 },
        fallbackVisualWidth: 0.5,
        tag: 'Player',
    },
    hazard: {
        defaultFallSpeed: 5,
        boundaryOffset: 1,
        fallbackBottomBoundary: -10,
        defaultRadius: 0.5,
        visual: { width: 0.6, height: 0.6 },
    },
    spawner: {
        count: 10,
        delayMin: 0.5,
        delayMax: 2,
        fallSpeed: 5,
        useViewportBounds: true,
        minX: -5,
        maxX: 5,
        spawnHeight: 8,
        viewportTopOffset: 0.5,
        templateName: '@ember',
    },
    loop: {
        fixedDelta: 1 / 120,
        maxStepsPerFrame: 5,
    },
} as const satisfies GameConfig;

export interface GameConfigOverrides {
    readonly camera?: Partial<CameraConfig>;
    readonly player?: Partial<PlayerConfig>;
    readonly hazard?: Partial<HazardConfig>;
    readonly spawner?: Partial<SpawnerConfig>;
    readonly loop?: Partial<LoopConfig>;
}

const assertFinite = (value: number, path: string): void => {
    if (!Number.isFinite(value)) {
        throw new RangeError(`${path} must be a finite number`);
    }
};

const assertNonNegative = (value: number, path: string): void => {
    assertFinite(value, path);
    if (value < 0) {
        throw new RangeError(`${path} must not be negative`);
    }
};

const validateConfig = (config: GameConfig): GameConfig => {
    assertNonNegative(config.camera.orthographicSize, 'camera.orthographicSize');
    assertNonNegative(config.camera.aspect, 'camera.aspect');
    assertFinite(config.camera.position.x, 'camera.position.x');
    assertFinite(config.camera.position.y, 'camera.position.y');

    assertFinite(config.player.moveSpeed, 'player.moveSpeed');
    assertFinite(config.player.startPosition.x, 'player.startPosition.x');
    assertFinite(config.player.startPosition.y, 'player.startPosition.y');

    // Hazards fall back to this speed, so it has to actually move them.
    if (!(config.hazard.defaultFallSpeed > 0) || !Number.isFinite(config.hazard.defaultFallSpeed)) {
        throw new RangeError('hazard.defaultFallSpeed must be a positive finite number');
    }

    // Non-positive speeds are legal here; hazards substitute their own default.
    assertFinite(config.spawner.fallSpeed, 'spawner.fallSpeed');
    assertNonNegative(config.spawner.delayMin, 'spawner.delayMin');
    assertNonNegative(config.spawner.delayMax, 'spawner.delayMax');
    assertNonNegative(config.spawner.count, 'spawner.count');
    if (!Number.isInteger(config.spawner.count)) {
        throw new RangeError('spawner.count must be an integer');
    }
    assertFinite(config.spawner.minX, 'spawner.minX');
    assertFinite(config.spawner.maxX, 'spawner.maxX');
    assertFinite(config.spawner.spawnHeight, 'spawner.spawnHeight');

    if (!(config.loop.fixedDelta > 0) || !Number.isFinite(config.loop.fixedDelta)) {
        throw new RangeError('loop.fixedDelta must be a positive finite number');
    }

    return config;
};

export const resolveGameConfig = (overrides: GameConfigOverrides = {}): GameConfig =>
    validateConfig({
        camera: { ...gameConfig.camera, ...overrides.camera },
        player: { ...gameConfig.player, ...overrides.player },
        hazard: { ...gameConfig.hazard, ...overrides.hazard },
        spawner: { ...gameConfig.spawner, ...overrides.spawner },
        loop: { ...gameConfig.loop, ...overrides.loop },
    });
