export const DEFAULT_FIXED_DELTA = 1 / 120;
export const DEFAULT_STEP_MS = DEFAULT_FIXED_DELTA * 1000;
const DEFAULT_MAX_STEPS_PER_FRAME = 5;
const DEFAULT_MAX_FRAME_DELTA_MS = 100;

export type FrameRequest = (callback: (timestamp: number) => void) => number;
export type FrameCancel = (handle: number) => void;

export interface FrameScheduler {
    readonly request: FrameRequest;
    readonly cancel: FrameCancel;
    readonly now: () => number;
}

const resolveNow = (): (() => number) => {
    if (typeof performance !== 'undefined' && typeof performance.now === 'function') {
        return () => performance.now();
    }
    return () => Date.now();
};

/** Timer-driven frames for hosts without `requestAnimationFrame` (Node, workers). */
const createTimerScheduler = (now: () => number, intervalMs: number): FrameScheduler => {
    const timers = new Map<number, ReturnType<typeof setTimeout>>();
    let nextHandle = 1;

    return {
        now,
        request: (callback) => {
            const handle = nextHandle++;
            timers.set(handle, setTimeout(() => {
                timers.delete(handle);
                callback(now());
            }, intervalMs));
            return handle;
        },
        cancel: (handle) => {
            const timer = timers.get(handle);
            if (timer !== undefined) {
                clearTimeout(timer);
                timers.delete(handle);
            }
        },
    };
};

export const resolveFrameScheduler = (options: LoopOptions = {}): FrameScheduler => {
    const now = options.now ?? resolveNow();
    if (options.raf && options.cancelRaf) {
        return { now, request: options.raf, cancel: options.cancelRaf };
    }

    if (typeof window !== 'undefined' && typeof window.requestAnimationFrame === 'function') {
        return {
            now,
            request: (callback) => window.requestAnimationFrame(callback),
            cancel: (handle) => window.cancelAnimationFrame(handle),
        };
    }

    return createTimerScheduler(now, DEFAULT_STEP_MS);
};

export interface LoopOptions {
    readonly fixedDelta?: number;
    readonly maxStepsPerFrame?: number;
    readonly maxFrameDeltaMs?: number;
    readonly now?: () => number;
    readonly raf?: FrameRequest;
    readonly cancelRaf?: FrameCancel;
}

export interface GameLoop {
    start(): void;
    stop(): void;
    isRunning(): boolean;
    /** Fixed steps run since the last `start`. */
    stepCount(): number;
}

/** Receives the fixed, unscaled step in seconds. */
export type UpdateCallback = (stepSeconds: number) => void;
export type RenderCallback = (alpha: number) => void;

export class FixedStepLoop implements GameLoop {
    readonly fixedDelta: number;
    private readonly stepMs: number;
    private readonly maxStepsPerFrame: number;
    private readonly maxFrameDeltaMs: number;
    private readonly scheduler: FrameScheduler;
    private accumulatorMs = 0;
    private lastTime = 0;
    private frameHandle: number | null = null;
    private running = false;
    private steps = 0;

    constructor(
        private readonly update: UpdateCallback,
        private readonly render: RenderCallback,
        options: LoopOptions = {},
    ) {
        const configuredDelta = options.fixedDelta ?? DEFAULT_FIXED_DELTA;
        this.fixedDelta = configuredDelta > 0 ? configuredDelta : DEFAULT_FIXED_DELTA;
        this.stepMs = this.fixedDelta * 1000;
        this.maxStepsPerFrame = Math.max(1, Math.floor(options.maxStepsPerFrame ?? DEFAULT_MAX_STEPS_PER_FRAME));
        // A frame can never be clamped below one step.
        this.maxFrameDeltaMs = Math.max(this.stepMs, options.maxFrameDeltaMs ?? DEFAULT_MAX_FRAME_DELTA_MS);
        this.scheduler = resolveFrameScheduler(options);
    }

    start(): void {
        if (this.running) {
            return;
        }

        this.running = true;
        this.accumulatorMs = 0;
        this.steps = 0;
        this.lastTime = this.scheduler.now();
        this.scheduleNext();
    }

    stop(): void {
        if (!this.running) {
            return;
        }

        this.running = false;
        if (this.frameHandle !== null) {
            this.scheduler.cancel(this.frameHandle);
            this.frameHandle = null;
        }
    }

    isRunning(): boolean {
        return this.running;
    }

    stepCount(): number {
        return this.steps;
    }

    private scheduleNext(): void {
        this.frameHandle = this.scheduler.request(this.tick);
    }

    private readonly tick = (): void => {
        this.frameHandle = null;
        if (!this.running) {
            return;
        }

        const currentTime = this.scheduler.now();
        const frameDeltaMs = Math.min(this.maxFrameDeltaMs, Math.max(0, currentTime - this.lastTime));
        this.lastTime = currentTime;
        this.accumulatorMs += frameDeltaMs;

        let stepsThisFrame = 0;
        while (this.accumulatorMs >= this.stepMs && stepsThisFrame < this.maxStepsPerFrame) {
            this.update(this.fixedDelta);
            this.accumulatorMs -= this.stepMs;
            stepsThisFrame += 1;
            this.steps += 1;
            if (!this.running) {
                return;
            }
        }

        if (stepsThisFrame === this.maxStepsPerFrame && this.accumulatorMs > this.stepMs) {
            this.accumulatorMs = this.stepMs;
        }

        this.render(Math.min(1, this.accumulatorMs / this.stepMs));
        this.scheduleNext();
    };
}

export const createGameLoop = (
    update: UpdateCallback,
    render: RenderCallback,
    options?: LoopOptions,
): GameLoop => new FixedStepLoop(update, render, options);
