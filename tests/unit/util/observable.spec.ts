import { describe, expect, it, vi } from 'vitest';
import { createSubject } from 'util/observable';
import { createRecordingLogger } from '../support/fixtures';

describe('createSubject', () => {
    it('delivers values in subscription order until unsubscribe', () => {
        const subject = createSubject<number>();
        const calls: string[] = [];

        const first = subject.subscribe((value) => calls.push(`first:${value}`));
        subject.subscribe((value) => calls.push(`second:${value}`));

        subject.next(1);
        first.unsubscribe();
        subject.next(2);

        expect(calls).toEqual(['first:1', 'second:1', 'second:2']);
        expect(subject.observerCount()).toBe(1);
    });

    it('applies subscriptions made during an emission from the next emission', () => {
        const subject = createSubject<string>();
        const late = vi.fn();
        subject.subscribe(() => {
            subject.subscribe(late);
        });

        subject.next('a');
        expect(late).not.toHaveBeenCalled();

        subject.next('b');
        expect(late).toHaveBeenCalledWith('b');
    });

    it('ignores emissions and subscriptions after completion', () => {
        const subject = createSubject<string>();
        const listener = vi.fn();
        subject.subscribe(listener);

        subject.next('alpha');
        subject.complete();
        subject.next('beta');

        const late = vi.fn();
        const lateSubscription = subject.subscribe(late);
        lateSubscription.unsubscribe();

        expect(listener).toHaveBeenCalledTimes(1);
        expect(late).not.toHaveBeenCalled();
        expect(subject.isComplete()).toBe(true);
        expect(subject.observerCount()).toBe(0);
    });

    it('logs channel activity under its label', () => {
        const { logger, entries } = createRecordingLogger();
        const subject = createSubject<number>({ label: 'game-over', logger });

        subject.subscribe(() => undefined);
        subject.next(1);

        expect(entries.map((entry) => `${entry.subsystem} ${entry.message}`)).toEqual([
            'test:channel:game-over subscribe',
            'test:channel:game-over next',
        ]);
    });
});
