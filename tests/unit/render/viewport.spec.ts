import { describe, expect, it } from 'vitest';
import { computeViewportFit, computeVisibleBounds, createCamera, resolveCamera, worldToScreen } from 'render/viewport';
import { makeCamera } from '../support/fixtures';

describe('camera helpers', () => {
    it('prefers the main camera and falls back to the first', () => {
        const side = createCamera({ orthographic: true, orthographicSize: 1, aspect: 1, position: { x: 0, y: 0 } }, 'side', false);
        const main = makeCamera();

        expect(resolveCamera([side, main])).toBe(main);
        expect(resolveCamera([side])).toBe(side);
        expect(resolveCamera([])).toBeNull();
    });

    it('computes the visible rectangle of an orthographic camera', () => {
        const bounds = computeVisibleBounds(makeCamera({ orthographicSize: 3, aspect: 2, position: { x: 1, y: 0 } }));

        expect(bounds).toEqual({ left: -5, right: 7, bottom: -3, top: 3, halfWidth: 6, halfHeight: 3 });
    });

    it('has no visible rectangle without an orthographic camera', () => {
        expect(computeVisibleBounds(null)).toBeNull();
        expect(computeVisibleBounds(makeCamera({ orthographic: false }))).toBeNull();
    });
});

describe('computeViewportFit', () => {
    it('letterboxes wide containers', () => {
        expect(computeViewportFit({ containerWidth: 1600, containerHeight: 600, contentWidth: 20, contentHeight: 10 })).toEqual({
            scale: 60,
            offsetX: 200,
            offsetY: 0,
        });
    });

    it('rejects empty content', () => {
        expect(() => computeViewportFit({ containerWidth: 10, containerHeight: 10, contentWidth: 0, contentHeight: 1 })).toThrow(
            'content dimensions must be positive',
        );
    });
});

describe('worldToScreen', () => {
    it('maps y-up world positions to y-down pixels', () => {
        const bounds = { left: -10, right: 10, bottom: -5, top: 5, halfWidth: 10, halfHeight: 5 };
        const fit = { scale: 10, offsetX: 0, offsetY: 0 };

        expect(worldToScreen({ x: 0, y: 0 }, bounds, fit)).toEqual({ x: 100, y: 50 });
        expect(worldToScreen({ x: -10, y: 5 }, bounds, fit)).toEqual({ x: 0, y: 0 });
        expect(worldToScreen({ x: 10, y: -5 }, bounds, fit)).toEqual({ x: 200, y: 100 });
    });
});
