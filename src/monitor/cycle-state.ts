export const CYCLE_INTERVAL_MS = 300_000;
export const IDLE_HEARTBEAT_INTERVAL_MS = 3_600_000;

/**
 * What one cycle hands to the next. Owned by the monitor loop and passed along
 * from iteration to iteration; nothing else writes it.
 */
export interface CycleState {
    /** Open interest seen by the last successful cycle; null until there is one. */
    readonly previousOpenInterest: number | null;
    /** Epoch ms of the last signal or heartbeat; null if nothing was emitted yet. */
    readonly lastOutputAt: number | null;
}

export const INITIAL_CYCLE_STATE: CycleState = Object.freeze({
    previousOpenInterest: null,
    lastOutputAt: null,
});

export function isHeartbeatDue(state: CycleState, now: number): boolean {
    return state.lastOutputAt === null || now - state.lastOutputAt > IDLE_HEARTBEAT_INTERVAL_MS;
}

export function withOutputAt(state: CycleState, now: number): CycleState {
    return { ...state, lastOutputAt: now };
}

export function withOpenInterest(state: CycleState, openInterest: number): CycleState {
    return { ...state, previousOpenInterest: openInterest };
}
