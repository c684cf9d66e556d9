import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import appConfig from './config/app.config';
import { SourceHttpModule } from './http/http.module';
import { SourcesModule } from './sources/sources.module';
import { AggregatorModule } from './aggregator/aggregator.module';
import { SignalsModule } from './signals/signals.module';
import { MonitorModule } from './monitor/monitor.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
    }),
    SourceHttpModule, // Global
    SourcesModule,
    AggregatorModule,
    SignalsModule,
    MonitorModule,
  ],
})
export class AppModule { }
