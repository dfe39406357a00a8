/**
 * RESPONSIBILITY: Turning thrown values into presentable messages and development tracing.
 * The engine itself never prints for the user; callers decide what to show.
 */
import { isEngineError } from './errors';

export const describeEngineError = (error: unknown): string => {
    if (isEngineError(error)) {
        return `[${error.component}] ${error.kind}: ${error.message}`;
    }
    return error instanceof Error ? error.message : String(error);
};

export const engineLog = (scope: string, msg: string, ...args: unknown[]) => {
    if (process.env.NODE_ENV === 'development') {
        console.debug(`[${scope}] ${msg}`, ...args);
    }
};
