import { isBotName } from './headless-engine';
import { runHeadlessSimulation, type SimulationInput } from './simulate';

export const USAGE = 'Usage: ember-dodge simulate [--seed N] [--duration S] [--bot idle|sweep|dodge] [--restarts N] [--count N] [--telemetry]';

export interface CliCommand {
    readonly execute: () => Promise<number>;
}

export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CliUsageError';
    }
}

interface MutableSimulationInput {
    seed?: number;
    durationSec?: number;
    bot?: SimulationInput['bot'];
    restarts?: number;
    count?: number;
    telemetry?: boolean;
}

const parseInteger = (flag: string, value: string | undefined): number => {
    const parsed = value === undefined ? Number.NaN : Number(value);
    if (!Number.isInteger(parsed)) {
        throw new CliUsageError(`${flag} expects an integer`);
    }
    return parsed;
};

const parseNonNegativeInteger = (flag: string, value: string | undefined): number => {
    const parsed = parseInteger(flag, value);
    if (parsed < 0) {
        throw new CliUsageError(`${flag} must not be negative`);
    }
    return parsed;
};

const parsePositiveNumber = (flag: string, value: string | undefined): number => {
    const parsed = value === undefined ? Number.NaN : Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new CliUsageError(`${flag} expects a positive number`);
    }
    return parsed;
};

export const parseSimulateArgs = (args: readonly string[]): SimulationInput => {
    const options: MutableSimulationInput = {};
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const value = args[i + 1];
        switch (arg) {
            case '--seed':
                options.seed = parseInteger(arg, value);
                i++;
                break;
            case '--duration':
                options.durationSec = parsePositiveNumber(arg, value);
                i++;
                break;
            case '--bot':
                if (!isBotName(value)) {
                    throw new CliUsageError('--bot expects one of idle, sweep, dodge');
                }
                options.bot = value;
                i++;
                break;
            case '--restarts':
                options.restarts = parseNonNegativeInteger(arg, value);
                i++;
                break;
            case '--count':
                options.count = parseNonNegativeInteger(arg, value);
                i++;
                break;
            case '--telemetry':
                options.telemetry = true;
                break;
            default:
                throw new CliUsageError(`Unknown option: ${arg}`);
        }
    }
    return options;
};

export function createCli(argv: readonly string[] = process.argv.slice(2)): CliCommand {
    const execute = async (): Promise<number> => {
        const [command, ...restArgs] = argv;
        if (command !== 'simulate') {
            console.error(USAGE);
            return 1;
        }

        let input: SimulationInput;
        try {
            input = parseSimulateArgs(restArgs);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`${message}\n${USAGE}`);
            return 1;
        }

        try {
            const result = await runHeadlessSimulation(input);
            console.log(JSON.stringify(result));
            return 0;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`Simulation failed: ${message}`);
            return 1;
        }
    };

    return {
        execute,
    };
}
