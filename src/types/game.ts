/**
 * 2D vector in world units. The world is y-up: hazards fall toward negative y.
 */
export interface Vector2 {
    x: number;
    y: number;
}

export interface Size {
    readonly width: number;
    readonly height: number;
}

/** Raw horizontal intent: no smoothing, no analog values. */
export type AxisValue = -1 | 0 | 1;

export type Facing = 'left' | 'right';

export type ColliderSpec =
    | { readonly shape: 'box'; readonly width: number; readonly height: number; readonly isTrigger?: boolean }
    | { readonly shape: 'circle'; readonly radius: number; readonly isTrigger?: boolean };

/**
 * Per-frame timing handed to every component. `deltaTime` is scaled by the global
 * time scale; `realtime` keeps counting while the game is halted.
 */
export interface FrameTime {
    readonly frame: number;
    readonly deltaTime: number;
    readonly unscaledDeltaTime: number;
    readonly time: number;
    readonly realtime: number;
    readonly timeScale: number;
}
