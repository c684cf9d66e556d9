import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { MonitorHealthIndicator } from './monitor.health';

@Controller('health')
export class HealthController {
    constructor(
        private readonly health: HealthCheckService,
        private readonly monitorHealth: MonitorHealthIndicator,
    ) { }

    @Get()
    @HealthCheck()
    check() {
        return this.health.check([() => this.monitorHealth.check('monitor')]);
    }
}
