import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { AggregatorModule } from '../aggregator/aggregator.module';
import { SignalsModule } from '../signals/signals.module';
import { MonitorLoopService } from './monitor-loop.service';
import { MonitorHealthIndicator } from './monitor.health';
import { HealthController } from './health.controller';

@Module({
    imports: [
        AggregatorModule,
        SignalsModule,
        TerminusModule,
    ],
    controllers: [HealthController],
    providers: [
        MonitorLoopService,
        MonitorHealthIndicator,
    ],
    exports: [MonitorLoopService],
})
export class MonitorModule { }
