import { Bodies, Body, Composite, Engine, Events } from 'physics/matter';
import type { IEventCollision, MatterBody, MatterEngine } from 'physics/matter';
import { rootLogger, type Logger } from 'util/log';
import type { ColliderSpec, Vector2 } from 'types/game';

const DEFAULT_TIMESTEP_MS = 1000 / 120;

export type EntityKind = 'player' | 'hazard';

/**
 * Identity attached to a body when it is registered. Collision consumers decide
 * who they touched from this marker, never from body labels.
 */
export interface EntityMarker {
    readonly id: string;
    readonly kind: EntityKind;
    readonly tags: ReadonlySet<string>;
}

export type TriggerPhase = 'enter' | 'stay';

export type TriggerHandler = (other: EntityMarker, phase: TriggerPhase) => void;

export interface PhysicsWorldConfig {
    readonly timeStepMs?: number;
    readonly logger?: Logger;
}

export interface SensorBodyOptions {
    readonly position: Vector2;
    readonly collider: ColliderSpec;
    readonly label?: string;
}

export interface PhysicsWorldHandle {
    readonly engine: MatterEngine;
    /** Builds a kinematic body: no gravity, no collision response, moved only by `moveTo`. */
    readonly createBody: (options: SensorBodyOptions) => MatterBody;
    readonly register: (body: MatterBody, marker: EntityMarker, onTrigger?: TriggerHandler) => void;
    readonly unregister: (body: MatterBody) => void;
    readonly isRegistered: (body: MatterBody) => boolean;
    readonly moveTo: (body: MatterBody, position: Vector2) => void;
    readonly step: (deltaMs?: number) => void;
    readonly bodyCount: () => number;
    readonly dispose: () => void;
}

interface Registration {
    readonly body: MatterBody;
    readonly marker: EntityMarker;
    readonly onTrigger?: TriggerHandler;
}

export const hasTag = (marker: EntityMarker, tag: string): boolean => marker.tags.has(tag);

export const createMarker = (id: string, kind: EntityKind, tags: readonly string[] = []): EntityMarker => ({
    id,
    kind,
    tags: new Set(tags),
});

const buildBody = ({ position, collider, label }: SensorBodyOptions): MatterBody => {
    const options = {
        label: label ?? 'sensor',
        isSensor: collider.isTrigger ?? true,
        isStatic: false,
        inertia: Infinity,
        frictionAir: 0,
        friction: 0,
    };

    if (collider.shape === 'circle') {
        return Bodies.circle(position.x, position.y, collider.radius, options);
    }

    return Bodies.rectangle(position.x, position.y, collider.width, collider.height, options);
};

export const createPhysicsWorld = (config: PhysicsWorldConfig = {}): PhysicsWorldHandle => {
    const logger = (config.logger ?? rootLogger).child('physics');
    const timeStep = config.timeStepMs ?? DEFAULT_TIMESTEP_MS;
    const engine = Engine.create({ enableSleeping: false });
    engine.gravity.x = 0;
    engine.gravity.y = 0;
    engine.gravity.scale = 0;

    const registrations = new Map<number, Registration>();
    let disposed = false;

    const dispatch = (event: IEventCollision<MatterEngine>, phase: TriggerPhase) => {
        for (const pair of event.pairs) {
            const first = registrations.get(pair.bodyA.id);
            const second = registrations.get(pair.bodyB.id);
            if (!first || !second) {
                continue;
            }

            first.onTrigger?.(second.marker, phase);
            // The first handler may have unregistered the second body.
            if (registrations.has(second.body.id)) {
                second.onTrigger?.(first.marker, phase);
            }
        }
    };

    const handleCollisionStart = (event: IEventCollision<MatterEngine>) => dispatch(event, 'enter');
    const handleCollisionActive = (event: IEventCollision<MatterEngine>) => dispatch(event, 'stay');

    Events.on(engine, 'collisionStart', handleCollisionStart);
    Events.on(engine, 'collisionActive', handleCollisionActive);

    const register: PhysicsWorldHandle['register'] = (body, marker, onTrigger) => {
        if (disposed) {
            throw new Error('Physics world has been disposed');
        }
        if (registrations.has(body.id)) {
            logger.warn('Body registered twice; keeping the first registration', { entity: marker.id });
            return;
        }

        Body.setVelocity(body, { x: 0, y: 0 });
        registrations.set(body.id, { body, marker, onTrigger });
        Composite.add(engine.world, body);
    };

    const unregister: PhysicsWorldHandle['unregister'] = (body) => {
        if (!registrations.delete(body.id)) {
            return;
        }
        Composite.remove(engine.world, body);
    };

    const moveTo: PhysicsWorldHandle['moveTo'] = (body, position) => {
        Body.setPosition(body, { x: position.x, y: position.y });
        Body.setVelocity(body, { x: 0, y: 0 });
    };

    const step: PhysicsWorldHandle['step'] = (deltaMs = timeStep) => {
        if (disposed || !(deltaMs > 0)) {
            return;
        }
        Engine.update(engine, deltaMs);
    };

    const dispose: PhysicsWorldHandle['dispose'] = () => {
        if (disposed) {
            return;
        }
        disposed = true;
        Events.off(engine, 'collisionStart', handleCollisionStart);
        Events.off(engine, 'collisionActive', handleCollisionActive);
        registrations.clear();
        Composite.clear(engine.world, false);
        Engine.clear(engine);
    };

    return {
        engine,
        createBody: buildBody,
        register,
        unregister,
        isRegistered: (body) => registrations.has(body.id),
        moveTo,
        step,
        bodyCount: () => registrations.size,
        dispose,
    };
};
