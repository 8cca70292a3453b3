import { KeyboardAxis } from 'input/keyboard-axis';
import { createStage, type StageHandle } from 'render/stage';
import { rootLogger } from 'util/log';

import { createGameRuntime, type GameRuntimeHandle } from './game-runtime';

const DESIGN_WIDTH = 1280;
const DESIGN_HEIGHT = 720;

export interface EmberDodgeOptions {
    readonly container?: HTMLElement;
    readonly seed?: number;
}

export interface EmberDodgeHandle {
    readonly runtime: GameRuntimeHandle;
    readonly stage: StageHandle;
    readonly getSeed: () => number;
    readonly destroy: () => void;
}

const logger = rootLogger.child('bootstrap');

const configureContainer = (container: HTMLElement): void => {
    container.style.margin = '0';
    container.style.padding = '0';
    container.style.overflow = 'hidden';
    container.style.backgroundColor = '#000000';
};

export async function bootstrapEmberDodge(options: EmberDodgeOptions = {}): Promise<EmberDodgeHandle> {
    const container = options.container ?? document.body;
    configureContainer(container);

    const keyboard = new KeyboardAxis();
    keyboard.attach(window);

    const stage = await createStage({
        parent: container,
        width: DESIGN_WIDTH,
        height: DESIGN_HEIGHT,
        resolution: window.devicePixelRatio || 1,
    });

    const runtime = createGameRuntime({
        input: keyboard,
        seed: options.seed,
        onRender: (snapshot) => stage.render(snapshot),
    });

    const detachRestart = keyboard.onRestartRequested(() => {
        if (!runtime.requestRestart()) {
            logger.debug('Restart ignored; game is still running');
        }
    });

    runtime.start();

    return {
        runtime,
        stage,
        getSeed: () => runtime.random.seed(),
        destroy() {
            detachRestart();
            keyboard.detach();
            runtime.destroy();
            stage.destroy();
        },
    };
}

const resolveSeedFromQuery = (): number | undefined => {
    const seedParam = new URLSearchParams(window.location.search).get('seed');
    if (!seedParam) {
        return undefined;
    }

    const parsed = Number.parseInt(seedParam, 10);
    return Number.isFinite(parsed) ? parsed : undefined;
};

const appContainer = document.getElementById('app');
if (appContainer) {
    bootstrapEmberDodge({ container: appContainer, seed: resolveSeedFromQuery() }).catch((error: unknown) => {
        logger.error('Failed to bootstrap Ember Dodge', { error });
    });
}
