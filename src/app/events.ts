import type { HazardDestroyCause } from 'game/hazard';

export interface VectorLike {
    readonly x: number;
    readonly y: number;
}

export interface HazardSpawnedPayload {
    readonly hazardId: string;
    readonly index: number;
    readonly position: VectorLike;
    readonly fallSpeed: number;
}

export interface HazardClearedPayload {
    readonly hazardId: string;
    readonly cause: HazardDestroyCause;
    readonly position: VectorLike;
}

export interface GameOverPayload {
    readonly playerX: number;
    readonly liveHazards: number;
}

export interface GameRestartedPayload {
    readonly restarts: number;
}

export interface EmberDodgeEventMap {
    readonly HazardSpawned: HazardSpawnedPayload;
    readonly HazardCleared: HazardClearedPayload;
    readonly GameOver: GameOverPayload;
    readonly GameRestarted: GameRestartedPayload;
}

export type EmberDodgeEventName = keyof EmberDodgeEventMap;

export interface EventEnvelope<EventName extends EmberDodgeEventName> {
    readonly type: EventName;
    readonly payload: EmberDodgeEventMap[EventName];
    /** Realtime seconds at publish. */
    readonly timestamp: number;
}

export type AnyEventEnvelope = { [EventName in EmberDodgeEventName]: EventEnvelope<EventName> }[EmberDodgeEventName];

export type EventListener<EventName extends EmberDodgeEventName> = (event: EventEnvelope<EventName>) => void;

export interface EmberDodgeEventBus {
    publish<EventName extends EmberDodgeEventName>(
        this: void,
        type: EventName,
        payload: EmberDodgeEventMap[EventName],
        timestamp?: number,
    ): void;
    subscribe<EventName extends EmberDodgeEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): () => void;
    /** Receives every event in publish order; used for telemetry capture. */
    subscribeAll(this: void, listener: (event: AnyEventEnvelope) => void): () => void;
    clear(this: void): void;
}

type InternalListener = (event: AnyEventEnvelope) => void;

export interface EventBusOptions {
    readonly now?: () => number;
}

export const createEventBus = (options: EventBusOptions = {}): EmberDodgeEventBus => {
    const registry = new Map<EmberDodgeEventName, Set<InternalListener>>();
    const wildcard = new Set<InternalListener>();
    const resolveNow = options.now ?? (() => 0);

    const ensureListenerSet = (type: EmberDodgeEventName): Set<InternalListener> => {
        const existing = registry.get(type);
        if (existing) {
            return existing;
        }
        const created = new Set<InternalListener>();
        registry.set(type, created);
        return created;
    };

    const publish: EmberDodgeEventBus['publish'] = (type, payload, timestamp = resolveNow()) => {
        // Envelope is built from a matching type/payload pair, so it belongs to the union.
        const envelope = { type, payload, timestamp } as AnyEventEnvelope;
        for (const listener of [...(registry.get(type) ?? [])]) {
            listener(envelope);
        }
        for (const listener of [...wildcard]) {
            listener(envelope);
        }
    };

    const subscribe: EmberDodgeEventBus['subscribe'] = (type, listener) => {
        const listeners = ensureListenerSet(type);
        const internal: InternalListener = (event) => {
            if (event.type === type) {
                listener(event as EventEnvelope<typeof type>);
            }
        };
        listeners.add(internal);
        return () => {
            listeners.delete(internal);
        };
    };

    const subscribeAll: EmberDodgeEventBus['subscribeAll'] = (listener) => {
        wildcard.add(listener);
        return () => {
            wildcard.delete(listener);
        };
    };

    return {
        publish,
        subscribe,
        subscribeAll,
        clear: () => {
            registry.clear();
            wildcard.clear();
        },
    };
};
