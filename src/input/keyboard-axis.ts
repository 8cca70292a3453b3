import type { AxisValue, FrameTime } from 'types/game';
import type { HorizontalAxis, RestartRequestSource } from './contracts';

const LEFT_KEYS: readonly string[] = ['ArrowLeft', 'KeyA'];
const RIGHT_KEYS: readonly string[] = ['ArrowRight', 'KeyD'];
const RESTART_KEYS: readonly string[] = ['KeyR', 'Enter'];

/**
 * Keyboard-backed horizontal axis. Holding both directions cancels out, the same
 * way a raw axis reads.
 */
export class KeyboardAxis implements HorizontalAxis, RestartRequestSource {
    private readonly pressed = new Set<string>();
    private readonly restartListeners = new Set<() => void>();
    private target: EventTarget | null = null;
    private readonly keyDownListener: (event: Event) => void;
    private readonly keyUpListener: (event: Event) => void;
    private readonly blurListener: () => void;

    constructor() {
        this.keyDownListener = this.handleKeyDown.bind(this);
        this.keyUpListener = this.handleKeyUp.bind(this);
        this.blurListener = () => this.pressed.clear();
    }

    attach(target: EventTarget): void {
        this.detach();
        this.target = target;
        target.addEventListener('keydown', this.keyDownListener);
        target.addEventListener('keyup', this.keyUpListener);
        target.addEventListener('blur', this.blurListener);
    }

    detach(): void {
        if (!this.target) {
            return;
        }
        this.target.removeEventListener('keydown', this.keyDownListener);
        this.target.removeEventListener('keyup', this.keyUpListener);
        this.target.removeEventListener('blur', this.blurListener);
        this.target = null;
        this.pressed.clear();
    }

    read(_frame: FrameTime): AxisValue {
        const left = LEFT_KEYS.some((code) => this.pressed.has(code));
        const right = RIGHT_KEYS.some((code) => this.pressed.has(code));
        if (left === right) {
            return 0;
        }
        return right ? 1 : -1;
    }

    onRestartRequested(listener: () => void): () => void {
        this.restartListeners.add(listener);
        return () => {
            this.restartListeners.delete(listener);
        };
    }

    private handleKeyDown(event: Event): void {
        if (!(event instanceof KeyboardEvent)) {
            return;
        }
        if (RESTART_KEYS.includes(event.code) && !event.repeat) {
            [...this.restartListeners].forEach((listener) => listener());
            return;
        }
        this.pressed.add(event.code);
    }

    private handleKeyUp(event: Event): void {
        if (!(event instanceof KeyboardEvent)) {
            return;
        }
        this.pressed.delete(event.code);
    }
}
