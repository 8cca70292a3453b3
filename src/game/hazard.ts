import type { GameState } from 'app/game-state';
import type { HazardConfig } from 'config/game';
import { createMarker, hasTag, type EntityMarker, type PhysicsWorldHandle, type TriggerPhase } from 'physics/world';
import type { MatterBody } from 'physics/matter';
import { computeVisibleBounds, type CameraLookup } from 'render/viewport';
import { rootLogger, type Logger } from 'util/log';
import { createSubject, type Observable } from 'util/observable';
import type { ColliderSpec, FrameTime, Size, Vector2 } from 'types/game';
import { PLAYER_TAG } from './player-agent';

export const DEFAULT_FALL_SPEED = 5;
export const DEFAULT_BOTTOM_BOUNDARY = -10;
const BOUNDARY_OFFSET = 1;
const DEFAULT_RADIUS = 0.5;

export type HazardTuning = Pick<
    HazardConfig,
    'defaultFallSpeed' | 'boundaryOffset' | 'fallbackBottomBoundary' | 'defaultRadius'
>;

const DEFAULT_TUNING: HazardTuning = {
    defaultFallSpeed: DEFAULT_FALL_SPEED,
    boundaryOffset: BOUNDARY_OFFSET,
    fallbackBottomBoundary: DEFAULT_BOTTOM_BOUNDARY,
    defaultRadius: DEFAULT_RADIUS,
};

/**
 * Authored, inactive description of a hazard. Live hazards are stamped out of it;
 * the blueprint itself never falls or collides.
 */
export interface HazardBlueprint {
    readonly name: string;
    readonly active: boolean;
    readonly fallSpeed: number;
    readonly visual?: Size | null;
    readonly collider?: ColliderSpec;
}

export type HazardDestroyCause = 'out-of-bounds' | 'cleanup' | 'scene-unload';

export interface HazardDestroyedEvent {
    readonly id: string;
    readonly cause: HazardDestroyCause;
    readonly position: Vector2;
}

export interface HazardOptions {
    readonly id: string;
    readonly blueprint: HazardBlueprint;
    readonly position: Vector2;
    readonly gameState: Pick<GameState, 'isOver' | 'gameOver'>;
    readonly physics: PhysicsWorldHandle;
    readonly findCamera: CameraLookup;
    readonly tuning?: Partial<HazardTuning>;
    readonly logger?: Logger;
}

export interface HazardSnapshot {
    readonly id: string;
    readonly position: Vector2;
    readonly radius: number;
    readonly hasCollided: boolean;
}

const isPlayer = (other: EntityMarker): boolean => other.kind === 'player' || hasTag(other, PLAYER_TAG);

export class Hazard {
    readonly id: string;
    private readonly options: HazardOptions;
    private readonly tuning: HazardTuning;
    private readonly logger: Logger;
    private readonly current: Vector2;
    private readonly destroyedSubject = createSubject<HazardDestroyedEvent>();
    private fallSpeed: number;
    private bottomBoundary: number;
    private collided = false;
    private destroyed = false;
    private started = false;
    private body: MatterBody | null = null;
    private radius: number;

    constructor(options: HazardOptions) {
        this.options = options;
        this.tuning = { ...DEFAULT_TUNING, ...options.tuning };
        this.bottomBoundary = this.tuning.fallbackBottomBoundary;
        this.id = options.id;
        this.logger = (options.logger ?? rootLogger).child('hazard');
        this.current = { x: options.position.x, y: options.position.y };
        this.fallSpeed = options.blueprint.fallSpeed;
        this.radius = this.tuning.defaultRadius;
    }

    get onDestroyed(): Observable<HazardDestroyedEvent> {
        return this.destroyedSubject;
    }

    get position(): Vector2 {
        return { x: this.current.x, y: this.current.y };
    }

    get hasCollided(): boolean {
        return this.collided;
    }

    get isDestroyed(): boolean {
        return this.destroyed;
    }

    get lowerBoundary(): number {
        return this.bottomBoundary;
    }

    start(): void {
        if (this.started || this.destroyed) {
            return;
        }
        this.started = true;
        this.bottomBoundary = this.computeBottomBoundary();

        const collider = this.ensureCollider();
        this.radius = collider.shape === 'circle' ? collider.radius : Math.max(collider.width, collider.height) / 2;
        this.body = this.options.physics.createBody({
            position: this.current,
            collider,
            label: 'hazard',
        });
        this.options.physics.register(this.body, createMarker(this.id, 'hazard'), (other, phase) =>
            this.handleTrigger(other, phase),
        );
        this.validateFallSpeed();
    }

    update(frame: FrameTime): void {
        if (this.destroyed || this.shouldStopMovement(frame)) {
            return;
        }

        const deltaTime = frame.deltaTime;
        if (deltaTime <= 0) {
            return;
        }

        this.current.y -= this.fallSpeed * deltaTime;
        if (this.body) {
            this.options.physics.moveTo(this.body, this.current);
        }

        if (this.current.y < this.bottomBoundary) {
            this.destroy('out-of-bounds');
        }
    }

    /** Enter and stay notifications both land here; fast bodies can miss a single enter. */
    handleTrigger(other: EntityMarker, phase: TriggerPhase): void {
        if (this.collided || this.destroyed) {
            return;
        }

        if (!isPlayer(other)) {
            return;
        }

        this.collided = true;
        this.logger.debug('Player hit', { hazard: this.id, phase });
        this.options.gameState.gameOver();
    }

    setFallSpeed(speed: number): void {
        this.fallSpeed = speed > 0 ? speed : this.tuning.defaultFallSpeed;
    }

    getFallSpeed(): number {
        return this.fallSpeed;
    }

    /** Moves the hazard without falling; used when placing or repositioning it. */
    setPosition(position: Vector2): void {
        this.current.x = position.x;
        this.current.y = position.y;
        if (this.body) {
            this.options.physics.moveTo(this.body, this.current);
        }
    }

    destroy(cause: HazardDestroyCause = 'cleanup'): void {
        if (this.destroyed) {
            return;
        }

        this.destroyed = true;
        this.destroyedSubject.next({ id: this.id, cause, position: this.position });
        this.destroyedSubject.complete();
        if (this.body) {
            this.options.physics.unregister(this.body);
            this.body = null;
        }
    }

    snapshot(): HazardSnapshot {
        return {
            id: this.id,
            position: this.position,
            radius: this.radius,
            hasCollided: this.collided,
        };
    }

    private shouldStopMovement(frame: FrameTime): boolean {
        return this.options.gameState.isOver || frame.timeScale <= 0 || this.fallSpeed <= 0;
    }

    private validateFallSpeed(): void {
        if (this.fallSpeed <= 0) {
            this.fallSpeed = this.tuning.defaultFallSpeed;
        }
    }

    private computeBottomBoundary(): number {
        const visible = computeVisibleBounds(this.options.findCamera());
        return visible ? visible.bottom - this.tuning.boundaryOffset : this.tuning.fallbackBottomBoundary;
    }

    private ensureCollider(): ColliderSpec {
        const authored = this.options.blueprint.collider;
        if (authored) {
            return { ...authored, isTrigger: true };
        }

        const visual = this.options.blueprint.visual;
        const radius = visual ? Math.max(visual.width, visual.height) / 2 : this.tuning.defaultRadius;
        return { shape: 'circle', radius, isTrigger: true };
    }
}
