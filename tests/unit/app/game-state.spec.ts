import { describe, expect, it, vi } from 'vitest';
import { createGameStateFixture, createRecordingLogger } from '../support/fixtures';

describe('createGameState', () => {
    it('halts time and notifies once however often game over is reported', () => {
        const { clock, gameState } = createGameStateFixture();
        const listener = vi.fn();
        gameState.onGameOver.subscribe(listener);
        clock.advance(1.5);

        gameState.gameOver();
        gameState.gameOver();

        expect(gameState.isOver).toBe(true);
        expect(clock.getTimeScale()).toBe(0);
        expect(listener).toHaveBeenCalledTimes(1);
        expect(listener).toHaveBeenCalledWith({ realtime: 1.5 });
    });

    it('resumes time and reloads the scene on restart', () => {
        const { clock, gameState, reloads } = createGameStateFixture();
        const order: string[] = [];
        gameState.onRestart.subscribe(() => order.push(`restart:${clock.getTimeScale()}`));

        gameState.gameOver();
        gameState.restartGame();

        expect(gameState.isOver).toBe(false);
        expect(clock.getTimeScale()).toBe(1);
        expect(order).toEqual(['restart:1']);
        expect(reloads()).toBe(1);
    });

    it('restarts even when the game is not over', () => {
        const { gameState, reloads } = createGameStateFixture();

        gameState.restartGame();

        expect(reloads()).toBe(1);
        expect(gameState.isOver).toBe(false);
    });

    it('clears the flag without reloading on reset', () => {
        const { clock, gameState, reloads } = createGameStateFixture();
        const restart = vi.fn();
        gameState.onRestart.subscribe(restart);

        gameState.gameOver();
        gameState.resetState();

        expect(gameState.isOver).toBe(false);
        expect(clock.getTimeScale()).toBe(1);
        expect(restart).not.toHaveBeenCalled();
        expect(reloads()).toBe(0);
    });

    it('logs transitions at info level', () => {
        const { logger, entries } = createRecordingLogger();
        const { gameState } = createGameStateFixture(logger);

        gameState.gameOver();
        gameState.restartGame();

        const infos = entries.filter((entry) => entry.level === 'info').map((entry) => entry.message);
        expect(infos).toEqual(['Game over', 'Restarting']);
    });
});
