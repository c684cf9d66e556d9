import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { MarketDataError, describeError } from '../common/errors/market-data.errors';
import { SnapshotAggregatorService } from '../aggregator/snapshot-aggregator.service';
import { SignalsGateway } from '../signals/signals.gateway';
import { SIGNAL_MESSAGES, TradeSignal, evaluateSignal } from '../signals/decision-engine';
import type { MarketSnapshot } from '../snapshot/dto/market-snapshot.dto';
import {
    CYCLE_INTERVAL_MS,
    INITIAL_CYCLE_STATE,
    isHeartbeatDue,
    withOpenInterest,
    withOutputAt,
    type CycleState,
} from './cycle-state';
import { MonitorPhase, type CycleOutcome, type CycleResult, type MonitorStatus } from './dto/monitor-status';

export const HEARTBEAT_MESSAGE = "I'm still checking";

@Injectable()
export class MonitorLoopService implements OnModuleDestroy {
    private readonly logger = new Logger(MonitorLoopService.name);
    private timer?: NodeJS.Timeout;
    private active = false;
    private phase = MonitorPhase.IDLE;

    private cyclesRun = 0;
    private consecutiveFailures = 0;
    private lastCycleAt: number | null = null;
    private lastError: string | null = null;
    private lastSignal: TradeSignal | null = null;

    constructor(
        private readonly aggregator: SnapshotAggregatorService,
        private readonly signalsGateway: SignalsGateway,
    ) { }

    onModuleDestroy() {
        this.stop();
    }

    /** Runs cycles back to back, CYCLE_INTERVAL_MS apart, until stop(). */
    start(): void {
        if (this.active) return;
        this.active = true;
        this.logger.log(`Starting market monitor (cycle every ${CYCLE_INTERVAL_MS / 1000}s)...`);
        void this.runLoop(INITIAL_CYCLE_STATE);
    }

    /** A single cycle from a fresh state, with no sleep afterwards. */
    async runOnce(): Promise<CycleOutcome> {
        const { outcome } = await this.runCycle(INITIAL_CYCLE_STATE);
        this.phase = MonitorPhase.STOPPED;
        return outcome;
    }

    stop(): void {
        this.active = false;
        if (this.timer) clearTimeout(this.timer);
        this.timer = undefined;
        this.phase = MonitorPhase.STOPPED;
    }

    /**
     * One bounded cycle: aggregate, evaluate, report. Source failures are caught here,
     * reported as a diagnostic, and leave `state` untouched.
     */
    async runCycle(state: CycleState, now: () => number = Date.now): Promise<CycleResult> {
        const cycleId = uuidv4();

        this.phase = MonitorPhase.AGGREGATING;
        let snapshot: MarketSnapshot;
        try {
            snapshot = await this.aggregator.buildSnapshot();
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            this.reportFailure(cycleId, failure, now());
            this.phase = MonitorPhase.IDLE;
            return { state, outcome: { kind: 'failed', cycleId, error: failure } };
        }

        this.logger.debug(
            `[${cycleId}] price=${snapshot.price} rsi=${snapshot.rsi.toFixed(2)} macdDiff=${snapshot.macdDiff.toFixed(4)} ` +
            `funding=${snapshot.fundingRate} oi=${snapshot.openInterest} (prev ${state.previousOpenInterest ?? 'n/a'}) ` +
            `dominance=${snapshot.dominance.toFixed(2)} sentiment=${snapshot.sentimentIndex} macroEvents=${snapshot.macroEvents.length}`,
        );

        this.phase = MonitorPhase.EVALUATING;
        const signal = evaluateSignal(snapshot, state.previousOpenInterest);

        this.phase = MonitorPhase.REPORTING;
        const reportedAt = now();
        let next = state;
        let outcome: CycleOutcome;

        if (signal) {
            this.reportSignal(cycleId, signal, snapshot, reportedAt);
            next = withOutputAt(next, reportedAt);
            outcome = { kind: 'signal', cycleId, signal, snapshot };
        } else if (isHeartbeatDue(state, reportedAt)) {
            this.reportHeartbeat(cycleId, reportedAt);
            next = withOutputAt(next, reportedAt);
            outcome = { kind: 'heartbeat', cycleId, snapshot };
        } else {
            outcome = { kind: 'quiet', cycleId, snapshot };
        }

        next = withOpenInterest(next, snapshot.openInterest);

        this.cyclesRun++;
        this.consecutiveFailures = 0;
        this.lastCycleAt = reportedAt;
        if (signal) this.lastSignal = signal;
        this.phase = MonitorPhase.IDLE;

        return { state: next, outcome };
    }

    getPhase(): MonitorPhase {
        return this.phase;
    }

    getStatus(): MonitorStatus {
        return {
            phase: this.phase,
            cyclesRun: this.cyclesRun,
            consecutiveFailures: this.consecutiveFailures,
            lastCycleAt: this.lastCycleAt === null ? null : new Date(this.lastCycleAt).toISOString(),
            lastError: this.lastError,
            lastSignal: this.lastSignal,
        };
    }

    private async runLoop(state: CycleState): Promise<void> {
        if (!this.active) return;

        let next = state;
        try {
            next = (await this.runCycle(state)).state;
        } catch (error) {
            this.logger.error(`Critical Error in Monitor Loop: ${describeError(error)}`, error instanceof Error ? error.stack : undefined);
        }

        if (!this.active) {
            this.phase = MonitorPhase.STOPPED;
            return;
        }
        this.scheduleNext(CYCLE_INTERVAL_MS, () => this.runLoop(next));
    }

    private reportSignal(cycleId: string, signal: TradeSignal, snapshot: MarketSnapshot, at: number) {
        const message = SIGNAL_MESSAGES[signal];
        this.logger.log(message);
        this.signalsGateway.broadcastSignal({ cycleId, signal, message, timestamp: new Date(at).toISOString(), snapshot });
    }

    private reportHeartbeat(cycleId: string, at: number) {
        this.logger.log(HEARTBEAT_MESSAGE);
        this.signalsGateway.broadcastHeartbeat({ cycleId, message: HEARTBEAT_MESSAGE, timestamp: new Date(at).toISOString() });
    }

    private reportFailure(cycleId: string, error: Error, at: number) {
        const message = `Error: ${error.message}`;
        this.cyclesRun++;
        this.consecutiveFailures++;
        this.lastCycleAt = at;
        this.lastError = error.message;

        this.logger.error(message);
        this.logger.debug(`[${cycleId}] cycle aborted, open interest baseline kept`);
        this.signalsGateway.broadcastDiagnostic({
            cycleId,
            message,
            source: error instanceof MarketDataError ? error.source : undefined,
            timestamp: new Date(at).toISOString(),
        });
    }

    private scheduleNext(delay: number, callback: () => Promise<void>) {
        if (this.timer) clearTimeout(this.timer);
        this.timer = setTimeout(() => void callback(), delay);
    }
}
