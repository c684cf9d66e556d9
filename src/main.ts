#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { Command } from 'commander';
import { AppModule } from './app.module';
import appConfig from './config/app.config';
import { MonitorLoopService } from './monitor/monitor-loop.service';

type CliOptions = {
  once?: boolean;
};

async function runSingleCycle() {
  const app = await NestFactory.createApplicationContext(AppModule);
  await app.get(MonitorLoopService).runOnce();
  await app.close();
}

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);
  const config = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);

  app.enableCors({
    origin: config.corsOrigin,
    credentials: true,
  });
  app.enableShutdownHooks();

  await app.listen(config.port);
  logger.log(`Application is running on: ${await app.getUrl()}`);

  app.get(MonitorLoopService).start();
}

const program = new Command();

program
  .name('market-signal-agent')
  .description('Poll ETH market, derivatives, sentiment and macro sources and emit LONG / SHORT signals')
  .option('--once', 'Run a single monitoring cycle and exit')
  .parse(process.argv);

const { once } = program.opts<CliOptions>();

(once ? runSingleCycle() : bootstrap()).catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
