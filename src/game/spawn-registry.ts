/**
 * Live-hazard bookkeeping for one game session. Outlives scene reloads so a
 * reloaded scene (or a second spawner) can tell that a spawn run already happened.
 */
export interface SpawnRegistry<T> {
    hasSpawned: boolean;
    readonly size: number;
    add(item: T): void;
    delete(item: T): boolean;
    has(item: T): boolean;
    values(): readonly T[];
    clear(): void;
    /** Clears the live set and the `hasSpawned` flag. */
    reset(): void;
}

export const createSpawnRegistry = <T>(): SpawnRegistry<T> => {
    const live = new Set<T>();
    let spawned = false;

    return {
        get hasSpawned() {
            return spawned;
        },
        set hasSpawned(value: boolean) {
            spawned = value;
        },
        get size() {
            return live.size;
        },
        add(item) {
            live.add(item);
        },
        delete(item) {
            return live.delete(item);
        },
        has(item) {
            return live.has(item);
        },
        values() {
            return [...live];
        },
        clear() {
            live.clear();
        },
        reset() {
            spawned = false;
            live.clear();
        },
    };
};
