import { Application, Container, Graphics, Text } from 'pixi.js';
import type { GameplaySnapshot } from 'scenes/gameplay';
import type { HazardSnapshot } from 'game/hazard';
import { computeViewportFit, worldToScreen, type ViewportFit, type VisibleBounds } from './viewport';

const DEFAULT_WIDTH = 1280;
const DEFAULT_HEIGHT = 720;
const DEFAULT_BACKGROUND = 0x0b0d17;
const PLAYER_COLOR = 0x4fc3f7;
const PLAYER_NOSE_COLOR = 0xffffff;
const HAZARD_COLOR = 0xff7043;
const HAZARD_HIT_COLOR = 0xffeb3b;
const BANNER_TEXT = 'GAME OVER\nPress R or Enter to restart';

export interface StageConfig {
    readonly parent?: HTMLElement;
    readonly width?: number;
    readonly height?: number;
    readonly background?: number;
    readonly resolution?: number;
}

export interface StageLayers {
    readonly root: Container;
    readonly playfield: Container;
    readonly hud: Container;
}

export interface StageHandle {
    readonly app: Application;
    readonly layers: StageLayers;
    /** Draws a snapshot; `null` hides the playfield. */
    render(snapshot: GameplaySnapshot | null): void;
    resize(size: { readonly width: number; readonly height: number }): void;
    hazardSpriteCount(): number;
    destroy(): void;
}

/** Unit square with a marker on its right edge, so mirroring shows facing. */
const createPlayerGraphic = (): Graphics => {
    const graphic = new Graphics();
    graphic.label = 'player';
    graphic.rect(-0.5, -0.5, 1, 1).fill(PLAYER_COLOR);
    graphic.rect(0.3, -0.15, 0.2, 0.3).fill(PLAYER_NOSE_COLOR);
    return graphic;
};

const createHazardGraphic = (id: string, color: number): Graphics => {
    const graphic = new Graphics();
    graphic.label = id;
    graphic.circle(0, 0, 1).fill(color);
    return graphic;
};

const createBanner = (): Text => {
    const banner = new Text({
        text: BANNER_TEXT,
        style: {
            fill: 0xffffff,
            fontFamily: 'monospace',
            fontSize: 36,
            align: 'center',
        },
    });
    banner.label = 'game-over-banner';
    banner.anchor.set(0.5);
    banner.visible = false;
    return banner;
};

const contentSize = (bounds: VisibleBounds) => ({
    contentWidth: bounds.halfWidth * 2,
    contentHeight: bounds.halfHeight * 2,
});

export const createStage = async (config: StageConfig = {}): Promise<StageHandle> => {
    const app = new Application();
    await app.init({
        width: config.width ?? DEFAULT_WIDTH,
        height: config.height ?? DEFAULT_HEIGHT,
        background: config.background ?? DEFAULT_BACKGROUND,
        resolution: config.resolution ?? 1,
        antialias: true,
    });
    config.parent?.appendChild(app.canvas);

    const root = new Container();
    root.label = 'root';
    const playfield = new Container();
    playfield.label = 'playfield';
    const hud = new Container();
    hud.label = 'hud';
    root.addChild(playfield, hud);
    app.stage.addChild(root);

    const player = createPlayerGraphic();
    player.visible = false;
    playfield.addChild(player);

    const banner = createBanner();
    hud.addChild(banner);

    const hazardSprites = new Map<string, Graphics>();
    const hitHazards = new Set<string>();
    let destroyed = false;

    const dropHazard = (id: string) => {
        const sprite = hazardSprites.get(id);
        if (!sprite) {
            return;
        }
        playfield.removeChild(sprite);
        sprite.destroy();
        hazardSprites.delete(id);
        hitHazards.delete(id);
    };

    const drawHazard = (hazard: HazardSnapshot, bounds: VisibleBounds, fit: ViewportFit) => {
        let sprite = hazardSprites.get(hazard.id);
        if (sprite && hazard.hasCollided && !hitHazards.has(hazard.id)) {
            dropHazard(hazard.id);
            sprite = undefined;
        }
        if (!sprite) {
            sprite = createHazardGraphic(hazard.id, hazard.hasCollided ? HAZARD_HIT_COLOR : HAZARD_COLOR);
            hazardSprites.set(hazard.id, sprite);
            if (hazard.hasCollided) {
                hitHazards.add(hazard.id);
            }
            playfield.addChild(sprite);
        }

        const screen = worldToScreen(hazard.position, bounds, fit);
        sprite.position.set(screen.x, screen.y);
        sprite.scale.set(hazard.radius * fit.scale, hazard.radius * fit.scale);
    };

    const render = (snapshot: GameplaySnapshot | null) => {
        if (destroyed) {
            return;
        }

        const bounds = snapshot?.visible ?? null;
        if (!snapshot || !bounds) {
            player.visible = false;
            banner.visible = false;
            [...hazardSprites.keys()].forEach(dropHazard);
            return;
        }

        const width = app.renderer.width;
        const height = app.renderer.height;
        const fit = computeViewportFit({ containerWidth: width, containerHeight: height, ...contentSize(bounds) });

        if (snapshot.player) {
            const { position, size, facing } = snapshot.player;
            const screen = worldToScreen(position, bounds, fit);
            const mirror = facing === 'left' ? -1 : 1;
            player.visible = true;
            player.position.set(screen.x, screen.y);
            player.scale.set(size.width * fit.scale * mirror, size.height * fit.scale);
        } else {
            player.visible = false;
        }

        const live = new Set(snapshot.hazards.map((hazard) => hazard.id));
        [...hazardSprites.keys()].filter((id) => !live.has(id)).forEach(dropHazard);
        snapshot.hazards.forEach((hazard) => drawHazard(hazard, bounds, fit));

        banner.visible = snapshot.isOver;
        banner.position.set(width / 2, height / 2);
    };

    return {
        app,
        layers: { root, playfield, hud },
        render,
        resize(size) {
            app.renderer.resize(size.width, size.height);
        },
        hazardSpriteCount: () => hazardSprites.size,
        destroy() {
            if (destroyed) {
                return;
            }
            destroyed = true;
            [...hazardSprites.keys()].forEach(dropHazard);
            app.destroy();
        },
    };
};
