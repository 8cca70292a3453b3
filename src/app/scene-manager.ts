import { rootLogger, type Logger } from 'util/log';
import type { FrameTime } from 'types/game';

export interface Scene {
    init(): void;
    update(frame: FrameTime): void;
    destroy(): void;
}

export interface SceneRuntimeContext {
    readonly sceneName: string;
    /** Requests a reload of the current scene at the next frame boundary. */
    readonly requestReload: () => void;
    readonly persistent: <T>(key: string, create: () => T) => T;
}

export type SceneFactory<TScene extends Scene = Scene> = (context: SceneRuntimeContext) => TScene;

export interface SceneManagerOptions {
    readonly logger?: Logger;
}

export interface SceneManagerHandle {
    register(name: string, factory: SceneFactory): void;
    switch(name: string): void;
    requestReload(): void;
    /** Applies a pending reload, then updates the active scene. */
    update(frame: FrameTime): void;
    getCurrentScene(): string | null;
    getActiveScene(): Scene | null;
    /**
     * Returns the session-lifetime service stored under `key`, creating it on first
     * use. Later requests for the same key never run their factory.
     */
    persistent<T>(key: string, create: () => T): T;
    reloadCount(): number;
    destroy(): void;
}

interface ActiveScene {
    readonly name: string;
    readonly scene: Scene;
}

export const createSceneManager = (options: SceneManagerOptions = {}): SceneManagerHandle => {
    const logger = (options.logger ?? rootLogger).child('scenes');
    const registrations = new Map<string, SceneFactory>();
    const services = new Map<string, unknown>();
    let active: ActiveScene | null = null;
    let reloadPending = false;
    let reloads = 0;
    let destroyed = false;

    const assertAlive = () => {
        if (destroyed) {
            throw new Error('Scene manager has been destroyed');
        }
    };

    const persistent = <T>(key: string, create: () => T): T => {
        if (services.has(key)) {
            logger.debug('Persistent service already exists; keeping the first instance', { key });
            // The map is keyed per service; callers agree on the type stored under a key.
            return services.get(key) as T;
        }
        const instance = create();
        services.set(key, instance);
        return instance;
    };

    const unloadActive = () => {
        const previous = active;
        active = null;
        previous?.scene.destroy();
    };

    const load = (name: string) => {
        const factory = registrations.get(name);
        if (!factory) {
            throw new Error(`Scene "${name}" is not registered`);
        }

        const scene = factory({
            sceneName: name,
            requestReload: () => {
                reloadPending = true;
            },
            persistent,
        });
        active = { name, scene };

        try {
            scene.init();
        } catch (error) {
            active = null;
            scene.destroy();
            throw error;
        }
    };

    const switchScene = (name: string) => {
        assertAlive();
        unloadActive();
        reloadPending = false;
        load(name);
        logger.debug('Scene loaded', { scene: name });
    };

    const applyReload = () => {
        reloadPending = false;
        const current = active;
        if (!current) {
            return;
        }
        unloadActive();
        load(current.name);
        reloads += 1;
        logger.info('Scene reloaded', { scene: current.name, reloads });
    };

    return {
        register(name, factory) {
            assertAlive();
            if (registrations.has(name)) {
                throw new Error(`Scene "${name}" already registered`);
            }
            registrations.set(name, factory);
        },
        switch: switchScene,
        requestReload() {
            reloadPending = true;
        },
        update(frame) {
            if (destroyed) {
                return;
            }
            if (reloadPending) {
                applyReload();
            }
            active?.scene.update(frame);
        },
        getCurrentScene: () => active?.name ?? null,
        getActiveScene: () => active?.scene ?? null,
        persistent,
        reloadCount: () => reloads,
        destroy() {
            if (destroyed) {
                return;
            }
            destroyed = true;
            unloadActive();
            services.clear();
            registrations.clear();
        },
    };
};
