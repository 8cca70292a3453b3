import { rootLogger, type Logger } from 'util/log';
import { createSubject, type Observable } from 'util/observable';
import type { TimeScaleControl } from './clock';

export interface GameOverEvent {
    readonly realtime: number;
}

export interface GameStateOptions {
    readonly clock: TimeScaleControl & { readonly realtime: () => number };
    /** Asks the host to reload the current scene. Invoked last by `restartGame`. */
    readonly reloadScene: () => void;
    readonly logger?: Logger;
}

/**
 * Session-lifetime game-over flag. Survives scene reloads; components receive it
 * by reference instead of reaching for a global.
 */
export interface GameState {
    readonly isOver: boolean;
    readonly onGameOver: Observable<GameOverEvent>;
    readonly onRestart: Observable<void>;
    gameOver(): void;
    restartGame(): void;
    resetState(): void;
    dispose(): void;
}

export const createGameState = ({ clock, reloadScene, logger = rootLogger }: GameStateOptions): GameState => {
    const stateLogger = logger.child('game-state');
    const gameOverSubject = createSubject<GameOverEvent>({ label: 'game-over', logger: stateLogger });
    const restartSubject = createSubject<void>({ label: 'restart', logger: stateLogger });
    let over = false;

    const resume = () => {
        over = false;
        clock.setTimeScale(1);
    };

    return {
        get isOver() {
            return over;
        },
        onGameOver: gameOverSubject,
        onRestart: restartSubject,
        gameOver() {
            if (over) {
                return;
            }

            over = true;
            clock.setTimeScale(0);
            stateLogger.info('Game over');
            gameOverSubject.next({ realtime: clock.realtime() });
        },
        restartGame() {
            resume();
            stateLogger.info('Restarting');
            restartSubject.next(undefined);
            reloadScene();
        },
        resetState() {
            resume();
        },
        dispose() {
            gameOverSubject.complete();
            restartSubject.complete();
        },
    };
};
