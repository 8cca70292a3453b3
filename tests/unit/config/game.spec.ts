import { describe, expect, it } from 'vitest';
import { gameConfig, resolveGameConfig } from 'config/game';

describe('resolveGameConfig', () => {
    it('returns the defaults when nothing is overridden', () => {
        const config = resolveGameConfig();

        expect(config.player.moveSpeed).toBe(5);
        expect(config.spawner).toEqual(gameConfig.spawner);
        expect(config.spawner.count).toBe(10);
        expect(config.spawner.delayMin).toBe(0.5);
        expect(config.spawner.delayMax).toBe(2);
        expect(config.hazard.defaultFallSpeed).toBe(5);
    });

    it('merges partial overrides section by section', () => {
        const config = resolveGameConfig({
            spawner: { count: 3, useViewportBounds: false },
            camera: { orthographicSize: 3 },
        });

        expect(config.spawner.count).toBe(3);
        expect(config.spawner.useViewportBounds).toBe(false);
        expect(config.spawner.delayMax).toBe(2);
        expect(config.camera.orthographicSize).toBe(3);
        expect(config.camera.aspect).toBeCloseTo(16 / 9);
    });

    it('allows non-positive fall speeds, which hazards replace with their default', () => {
        expect(resolveGameConfig({ spawner: { fallSpeed: 0 } }).spawner.fallSpeed).toBe(0);
    });

    it('rejects invalid values', () => {
        expect(() => resolveGameConfig({ spawner: { count: 2.5 } })).toThrow('spawner.count must be an integer');
        expect(() => resolveGameConfig({ spawner: { delayMin: -1 } })).toThrow('spawner.delayMin must not be negative');
        expect(() => resolveGameConfig({ player: { moveSpeed: Number.POSITIVE_INFINITY } })).toThrow(
            'player.moveSpeed must be a finite number',
        );
        expect(() => resolveGameConfig({ loop: { fixedDelta: 0 } })).toThrow(RangeError);
        expect(() => resolveGameConfig({ hazard: { defaultFallSpeed: 0 } })).toThrow(
            'hazard.defaultFallSpeed must be a positive finite number',
        );
    });
});
