import type { GameState } from 'app/game-state';
import type { HorizontalAxis } from 'input/contracts';
import { createMarker, type PhysicsWorldHandle } from 'physics/world';
import type { MatterBody } from 'physics/matter';
import { computeVisibleBounds, type CameraLookup } from 'render/viewport';
import { rootLogger, type Logger } from 'util/log';
import { clamp } from 'util/math';
import type { AxisValue, ColliderSpec, Facing, FrameTime, Size, Vector2 } from 'types/game';

const DEFAULT_MOVE_SPEED = 5;
const DEFAULT_VISUAL_WIDTH = 0.5;
const DEFAULT_COLLIDER_SIZE = 1;
export const PLAYER_TAG = 'Player';

export interface HorizontalBounds {
    readonly minX: number;
    readonly maxX: number;
}

export interface PlayerAgentOptions {
    readonly id?: string;
    readonly gameState: Pick<GameState, 'isOver'>;
    readonly input: HorizontalAxis;
    readonly physics: PhysicsWorldHandle;
    readonly findCamera: CameraLookup;
    readonly position: Vector2;
    readonly moveSpeed?: number;
    /** Rendered footprint; `null` when the agent has no visual. */
    readonly visual?: Size | null;
    /** Width assumed for bound calculation when there is no visual. */
    readonly fallbackVisualWidth?: number;
    /** Authored collider. Forced into trigger mode; a box is added when absent. */
    readonly collider?: ColliderSpec;
    readonly tag?: string;
    readonly logger?: Logger;
}

export interface PlayerSnapshot {
    readonly id: string;
    readonly position: Vector2;
    readonly facing: Facing;
    readonly size: Size;
    readonly bounds: HorizontalBounds | null;
}

export class PlayerAgent {
    readonly id: string;
    private readonly options: PlayerAgentOptions;
    private readonly moveSpeed: number;
    private readonly logger: Logger;
    private readonly current: Vector2;
    private facingDirection: Facing = 'right';
    private lastIntent: AxisValue = 0;
    private horizontalBounds: HorizontalBounds | null = null;
    private body: MatterBody | null = null;
    private collider: ColliderSpec | null = null;

    constructor(options: PlayerAgentOptions) {
        this.options = options;
        this.id = options.id ?? 'player';
        this.moveSpeed = options.moveSpeed ?? DEFAULT_MOVE_SPEED;
        this.logger = (options.logger ?? rootLogger).child('player');
        this.current = { x: options.position.x, y: options.position.y };
    }

    get position(): Vector2 {
        return { x: this.current.x, y: this.current.y };
    }

    get facing(): Facing {
        return this.facingDirection;
    }

    get bounds(): HorizontalBounds | null {
        return this.horizontalBounds;
    }

    get intent(): AxisValue {
        return this.lastIntent;
    }

    start(): void {
        this.horizontalBounds = this.computeBounds();
        this.collider = this.ensureCollider();
        this.body = this.options.physics.createBody({
            position: this.current,
            collider: this.collider,
            label: 'player',
        });
        this.options.physics.register(this.body, createMarker(this.id, 'player', [this.options.tag ?? PLAYER_TAG]));
        this.logger.debug('Player ready', {
            bounds: this.horizontalBounds,
            collider: this.collider.shape,
        });
    }

    update(frame: FrameTime): void {
        if (this.options.gameState.isOver) {
            return;
        }

        this.lastIntent = this.options.input.read(frame);
        this.move(frame.deltaTime);
        this.updateFacing();
    }

    destroy(): void {
        if (this.body) {
            this.options.physics.unregister(this.body);
            this.body = null;
        }
    }

    snapshot(): PlayerSnapshot {
        return {
            id: this.id,
            position: this.position,
            facing: this.facingDirection,
            size: this.footprint(),
            bounds: this.horizontalBounds,
        };
    }

    private move(deltaTime: number): void {
        let nextX = this.current.x + this.lastIntent * this.moveSpeed * deltaTime;
        if (this.horizontalBounds) {
            nextX = clamp(nextX, this.horizontalBounds.minX, this.horizontalBounds.maxX);
        }

        this.current.x = nextX;
        if (this.body) {
            this.options.physics.moveTo(this.body, this.current);
        }
    }

    private updateFacing(): void {
        if (this.lastIntent > 0) {
            this.facingDirection = 'right';
        } else if (this.lastIntent < 0) {
            this.facingDirection = 'left';
        }
    }

    private computeBounds(): HorizontalBounds | null {
        const visible = computeVisibleBounds(this.options.findCamera());
        if (!visible) {
            // Without an orthographic camera there is no visible edge to stay inside.
            return null;
        }

        const visualWidth = this.options.visual?.width ?? this.options.fallbackVisualWidth ?? DEFAULT_VISUAL_WIDTH;
        const halfVisual = visualWidth / 2;
        return {
            minX: visible.left + halfVisual,
            maxX: visible.right - halfVisual,
        };
    }

    private ensureCollider(): ColliderSpec {
        const authored = this.options.collider;
        if (authored) {
            return { ...authored, isTrigger: true };
        }

        const visual = this.options.visual;
        return {
            shape: 'box',
            width: visual?.width ?? DEFAULT_COLLIDER_SIZE,
            height: visual?.height ?? DEFAULT_COLLIDER_SIZE,
            isTrigger: true,
        };
    }

    private footprint(): Size {
        if (this.options.visual) {
            return this.options.visual;
        }
        const collider = this.collider;
        if (collider?.shape === 'box') {
            return { width: collider.width, height: collider.height };
        }
        if (collider?.shape === 'circle') {
            return { width: collider.radius * 2, height: collider.radius * 2 };
        }
        return { width: DEFAULT_COLLIDER_SIZE, height: DEFAULT_COLLIDER_SIZE };
    }
}
