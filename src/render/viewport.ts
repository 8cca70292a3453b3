import type { CameraConfig } from 'config/game';
import type { Vector2 } from 'types/game';

export interface Camera {
    readonly name: string;
    readonly main: boolean;
    readonly orthographic: boolean;
    readonly orthographicSize: number;
    readonly aspect: number;
    readonly position: Vector2;
}

export interface VisibleBounds {
    readonly left: number;
    readonly right: number;
    readonly bottom: number;
    readonly top: number;
    readonly halfWidth: number;
    readonly halfHeight: number;
}

export type CameraLookup = () => Camera | null;

export const createCamera = (config: CameraConfig, name = 'main-camera', main = true): Camera => ({
    name,
    main,
    orthographic: config.orthographic,
    orthographicSize: config.orthographicSize,
    aspect: config.aspect,
    position: { x: config.position.x, y: config.position.y },
});

/** The camera flagged as main, else the first camera available. */
export const resolveCamera = (cameras: readonly Camera[]): Camera | null =>
    cameras.find((camera) => camera.main) ?? cameras[0] ?? null;

/**
 * Visible world rectangle of an orthographic camera; `null` for perspective
 * cameras, which have no fixed extent.
 */
export const computeVisibleBounds = (camera: Camera | null): VisibleBounds | null => {
    if (!camera?.orthographic) {
        return null;
    }

    const halfHeight = camera.orthographicSize;
    const halfWidth = halfHeight * camera.aspect;
    const { x, y } = camera.position;

    return {
        left: x - halfWidth,
        right: x + halfWidth,
        bottom: y - halfHeight,
        top: y + halfHeight,
        halfWidth,
        halfHeight,
    };
};

export interface ViewportFit {
    readonly scale: number;
    readonly offsetX: number;
    readonly offsetY: number;
}

export interface ComputeViewportFitOptions {
    readonly containerWidth: number;
    readonly containerHeight: number;
    readonly contentWidth: number;
    readonly contentHeight: number;
}

export const computeViewportFit = ({
    containerWidth,
    containerHeight,
    contentWidth,
    contentHeight,
}: ComputeViewportFitOptions): ViewportFit => {
    if (contentWidth <= 0 || contentHeight <= 0) {
        throw new RangeError('content dimensions must be positive');
    }

    if (containerWidth <= 0 || containerHeight <= 0) {
        return { scale: 1, offsetX: 0, offsetY: 0 };
    }

    const targetRatio = contentWidth / contentHeight;
    const containerRatio = containerWidth / containerHeight;

    if (containerRatio > targetRatio) {
        const scale = containerHeight / contentHeight;
        return { scale, offsetX: (containerWidth - contentWidth * scale) / 2, offsetY: 0 };
    }

    const scale = containerWidth / contentWidth;
    return { scale, offsetX: 0, offsetY: (containerHeight - contentHeight * scale) / 2 };
};

/**
 * Maps a y-up world position to y-down screen pixels for a fitted camera view.
 */
export const worldToScreen = (position: Vector2, bounds: VisibleBounds, fit: ViewportFit): Vector2 => ({
    x: fit.offsetX + (position.x - bounds.left) * fit.scale,
    y: fit.offsetY + (bounds.top - position.y) * fit.scale,
});
