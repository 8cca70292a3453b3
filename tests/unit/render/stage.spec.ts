import { afterEach, describe, expect, it, vi } from 'vitest';

vi.mock('pixi.js', () => {
    class Point {
        public x = 0;
        public y = 0;

        public set(x: number, y?: number): void {
            this.x = x;
            this.y = y ?? x;
        }
    }

    class Container {
        public children: unknown[] = [];
        public label = '';
        public visible = true;
        public destroyed = false;
        public readonly position = new Point();
        public readonly scale = new Point();

        public constructor() {
            this.scale.set(1, 1);
        }

        public addChild<T>(...items: T[]): T {
            this.children.push(...items);
            return items[0];
        }

        public removeChild<T>(item: T): T {
            this.children = this.children.filter((child) => child !== item);
            return item;
        }

        public destroy(): void {
            this.destroyed = true;
        }
    }

    class Graphics extends Container {
        public readonly ops: string[] = [];

        public rect(): this {
            this.ops.push('rect');
            return this;
        }

        public circle(): this {
            this.ops.push('circle');
            return this;
        }

        public fill(color: number): this {
            this.ops.push(`fill:${color.toString(16)}`);
            return this;
        }
    }

    class Text extends Container {
        public text: string;
        public readonly anchor = new Point();

        public constructor(options: { text: string }) {
            super();
            this.text = options.text;
        }
    }

    class Application {
        public readonly stage = new Container();
        public readonly renderer = {
            width: 0,
            height: 0,
            resize(width: number, height: number) {
                this.width = width;
                this.height = height;
            },
        };
        public readonly canvas = document.createElement('canvas');

        public async init(options: { width: number; height: number }): Promise<void> {
            this.renderer.width = options.width;
            this.renderer.height = options.height;
        }

        public destroy(): void {
            this.canvas.remove();
        }
    }

    return { Application, Container, Graphics, Text };
});

import { createStage, type StageHandle } from 'render/stage';
import type { GameplaySnapshot } from 'scenes/gameplay';

const VISIBLE = { left: -10, right: 10, bottom: -5, top: 5, halfWidth: 10, halfHeight: 5 };

const snapshotOf = (overrides: Partial<GameplaySnapshot> = {}): GameplaySnapshot => ({
    scene: 'gameplay',
    isOver: false,
    visible: VISIBLE,
    player: {
        id: 'player',
        position: { x: 0, y: -4 },
        facing: 'left',
        size: { width: 1, height: 1 },
        bounds: { minX: -9.5, maxX: 9.5 },
    },
    hazards: [{ id: 'ember-1', position: { x: 2, y: 5 }, radius: 0.3, hasCollided: false }],
    spawnerPhase: 'spawning',
    ...overrides,
});

const findByLabel = (stage: StageHandle, label: string) => {
    const node = [...stage.layers.playfield.children, ...stage.layers.hud.children].find((child) => child.label === label);
    if (!node) {
        throw new Error(`No node labelled ${label}`);
    }
    return node;
};

let stage: StageHandle | null = null;

afterEach(() => {
    stage?.destroy();
    stage = null;
    document.body.innerHTML = '';
});

describe('createStage', () => {
    it('mounts the canvas and builds the layers', async () => {
        const parent = document.createElement('div');
        document.body.appendChild(parent);
        stage = await createStage({ parent, width: 800, height: 400 });

        expect(parent.contains(stage.app.canvas)).toBe(true);
        expect(stage.app.renderer.width).toBe(800);
        expect(stage.layers.playfield.label).toBe('playfield');
        expect(stage.layers.hud.label).toBe('hud');
    });

    it('maps the player into the fitted view and mirrors it by facing', async () => {
        stage = await createStage({ width: 800, height: 400 });

        stage.render(snapshotOf());

        const player = findByLabel(stage, 'player');
        expect(player.visible).toBe(true);
        expect(player.position.x).toBe(400);
        expect(player.position.y).toBe(360);
        expect(player.scale.x).toBe(-40);
        expect(player.scale.y).toBe(40);
    });

    it('draws one circle per live hazard and drops cleared ones', async () => {
        stage = await createStage({ width: 800, height: 400 });

        stage.render(snapshotOf());
        const ember = findByLabel(stage, 'ember-1');
        expect(ember.position.x).toBe(480);
        expect(ember.position.y).toBe(0);
        expect(ember.scale.x).toBeCloseTo(12, 10);
        expect(stage.hazardSpriteCount()).toBe(1);

        stage.render(snapshotOf({ hazards: [] }));
        expect(stage.hazardSpriteCount()).toBe(0);
        expect(stage.layers.playfield.children.some((child) => child.label === 'ember-1')).toBe(false);
    });

    it('shows the banner only while the game is over', async () => {
        stage = await createStage({ width: 800, height: 400 });

        stage.render(snapshotOf());
        expect(findByLabel(stage, 'game-over-banner').visible).toBe(false);

        stage.render(snapshotOf({ isOver: true }));
        const banner = findByLabel(stage, 'game-over-banner');
        expect(banner.visible).toBe(true);
        expect(banner.position.x).toBe(400);
        expect(banner.position.y).toBe(200);
    });

    it('hides the playfield without a snapshot', async () => {
        stage = await createStage({ width: 800, height: 400 });
        stage.render(snapshotOf());

        stage.render(null);

        expect(findByLabel(stage, 'player').visible).toBe(false);
        expect(stage.hazardSpriteCount()).toBe(0);
    });
});
