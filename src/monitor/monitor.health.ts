import { Injectable } from '@nestjs/common';
import { HealthCheckError, type HealthIndicatorResult } from '@nestjs/terminus';
import { MonitorLoopService } from './monitor-loop.service';

export const MAX_CONSECUTIVE_FAILURES = 3;

@Injectable()
export class MonitorHealthIndicator {

  constructor(private readonly monitor: MonitorLoopService) { }

  check(key: string): HealthIndicatorResult {
    const status = this.monitor.getStatus();
    const details = {
      phase: status.phase,
      cyclesRun: status.cyclesRun,
      consecutiveFailures: status.consecutiveFailures,
      lastCycleAt: status.lastCycleAt,
      lastSignal: status.lastSignal,
    };

    if (status.consecutiveFailures >= MAX_CONSECUTIVE_FAILURES) {
      throw new HealthCheckError('Market monitor is failing', {
        [key]: { status: 'down', ...details, message: status.lastError },
      });
    }
    return { [key]: { status: 'up', ...details } };
  }
}
