import type { MarketSnapshot } from '../../snapshot/dto/market-snapshot.dto';
import type { TradeSignal } from '../../signals/decision-engine';
import type { CycleState } from '../cycle-state';

export enum MonitorPhase {
    IDLE = 'IDLE',
    AGGREGATING = 'AGGREGATING',
    EVALUATING = 'EVALUATING',
    REPORTING = 'REPORTING',
    STOPPED = 'STOPPED',
}

export type CycleOutcome =
    | { kind: 'signal'; cycleId: string; signal: TradeSignal; snapshot: MarketSnapshot }
    | { kind: 'heartbeat'; cycleId: string; snapshot: MarketSnapshot }
    | { kind: 'quiet'; cycleId: string; snapshot: MarketSnapshot }
    | { kind: 'failed'; cycleId: string; error: Error };

export interface CycleResult {
    state: CycleState;
    outcome: CycleOutcome;
}

export interface MonitorStatus {
    phase: MonitorPhase;
    cyclesRun: number;
    consecutiveFailures: number;
    lastCycleAt: string | null;
    lastError: string | null;
    lastSignal: TradeSignal | null;
}
