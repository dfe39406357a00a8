import { HoleStatus, TERMINAL_STATUSES } from '../../types';

export const isTerminalStatus = (status: HoleStatus): boolean => TERMINAL_STATUSES.includes(status);

/**
 * Lifecycle rules. Open states (pending, processing) may move anywhere; a terminal
 * result only changes when the hole is explicitly re-detected. Staying put is always allowed.
 */
export const canTransition = (from: HoleStatus, to: HoleStatus, options: { redetect?: boolean } = {}): boolean => {
    if (from === to) return true;
    if (!isTerminalStatus(from)) return true;
    return options.redetect === true;
};
