import type { MarketSnapshot } from '../../snapshot/dto/market-snapshot.dto';
import type { TradeSignal } from '../decision-engine';

export interface SignalNotification {
    cycleId: string;
    signal: TradeSignal;
    message: string;
    timestamp: string; // ISO 8601
    snapshot: MarketSnapshot;
}

export interface HeartbeatNotification {
    cycleId: string;
    message: string;
    timestamp: string;
}

export interface DiagnosticNotification {
    cycleId: string;
    message: string;
    source?: string; // set when a specific data source failed
    timestamp: string;
}
