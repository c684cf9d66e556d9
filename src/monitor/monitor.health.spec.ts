import { HealthCheckError } from '@nestjs/terminus';
import { Test } from '@nestjs/testing';
import { MonitorPhase, type MonitorStatus } from './dto/monitor-status';
import { MonitorLoopService } from './monitor-loop.service';
import { MonitorHealthIndicator } from './monitor.health';

describe('MonitorHealthIndicator', () => {
  const getStatus = jest.fn<MonitorStatus, []>();
  let indicator: MonitorHealthIndicator;

  const status = (overrides: Partial<MonitorStatus>): MonitorStatus => ({
    phase: MonitorPhase.IDLE,
    cyclesRun: 4,
    consecutiveFailures: 0,
    lastCycleAt: '2026-10-18T09:20:00.000Z',
    lastError: null,
    lastSignal: null,
    ...overrides,
  });

  beforeEach(async () => {
    getStatus.mockReset();
    const moduleRef = await Test.createTestingModule({
      providers: [
        MonitorHealthIndicator,
        { provide: MonitorLoopService, useValue: { getStatus } },
      ],
    }).compile();
    indicator = moduleRef.get(MonitorHealthIndicator);
  });

  it('should report up while cycles succeed', () => {
    getStatus.mockReturnValue(status({}));

    expect(indicator.check('monitor')).toEqual({
      monitor: {
        status: 'up',
        phase: MonitorPhase.IDLE,
        cyclesRun: 4,
        consecutiveFailures: 0,
        lastCycleAt: '2026-10-18T09:20:00.000Z',
        lastSignal: null,
      },
    });
  });

  it('should stay up through two failed cycles', () => {
    getStatus.mockReturnValue(status({ consecutiveFailures: 2, lastError: 'price request failed: timed out' }));

    expect(indicator.check('monitor').monitor.status).toBe('up');
  });

  it('should report down after three failed cycles in a row', () => {
    getStatus.mockReturnValue(status({ consecutiveFailures: 3, lastError: 'price request failed: timed out' }));

    expect(() => indicator.check('monitor')).toThrow(HealthCheckError);
    try {
      indicator.check('monitor');
    } catch (error) {
      expect(error).toBeInstanceOf(HealthCheckError);
      if (error instanceof HealthCheckError) {
        expect(error.causes).toEqual({
          monitor: expect.objectContaining({ status: 'down', consecutiveFailures: 3, message: 'price request failed: timed out' }),
        });
      }
    }
  });
});
