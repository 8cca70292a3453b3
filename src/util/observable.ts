import { rootLogger, type Logger } from 'util/log';

export interface Subscription {
    unsubscribe(this: void): void;
}

export interface Observable<T> {
    subscribe(this: void, observer: (value: T) => void): Subscription;
}

export interface Subject<T> extends Observable<T> {
    next(this: void, value: T): void;
    complete(this: void): void;
    readonly observerCount: (this: void) => number;
    readonly isComplete: (this: void) => boolean;
}

export interface SubjectOptions {
    /** When set, subscription changes and emissions are logged at debug level under this label. */
    readonly label?: string;
    readonly logger?: Logger;
}

const NOOP_SUBSCRIPTION: Subscription = {
    unsubscribe: () => undefined,
};

const sanitizeLabel = (label: string): string => label.trim() || 'anonymous';

/**
 * Synchronous multicast channel. Observers run in subscription order; an observer
 * added or removed during an emission takes effect from the next emission.
 */
export const createSubject = <T>(options: SubjectOptions = {}): Subject<T> => {
    const observers = new Set<(value: T) => void>();
    let completed = false;

    const subjectLogger = options.label
        ? (options.logger ?? rootLogger).child(`channel:${sanitizeLabel(options.label)}`)
        : null;

    const log = (message: string, context?: Record<string, unknown>) => {
        subjectLogger?.debug(message, context);
    };

    const subscribe = (observer: (value: T) => void): Subscription => {
        if (completed) {
            log('subscribe-after-complete');
            return NOOP_SUBSCRIPTION;
        }

        observers.add(observer);
        log('subscribe', { observers: observers.size });

        return {
            unsubscribe: () => {
                if (observers.delete(observer)) {
                    log('unsubscribe', { observers: observers.size });
                }
            },
        };
    };

    const next = (value: T): void => {
        if (completed) {
            log('next-after-complete');
            return;
        }

        log('next', { observers: observers.size });
        for (const observer of [...observers]) {
            observer(value);
        }
    };

    const complete = (): void => {
        if (completed) {
            return;
        }

        completed = true;
        log('complete', { observers: observers.size });
        observers.clear();
    };

    return {
        subscribe,
        next,
        complete,
        observerCount: () => observers.size,
        isComplete: () => completed,
    };
};
