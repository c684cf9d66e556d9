import { Module, Global } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import type { ConfigType } from '@nestjs/config';
import appConfig from '../config/app.config';
import { SourceHttpService } from './source-http.service';

@Global()
@Module({
    imports: [
        ConfigModule.forFeature(appConfig),
        HttpModule.registerAsync({
            imports: [ConfigModule.forFeature(appConfig)],
            inject: [appConfig.KEY],
            useFactory: (config: ConfigType<typeof appConfig>) => ({
                timeout: config.sources.httpTimeoutMs,
                headers: { Accept: 'application/json' },
            }),
        }),
    ],
    providers: [SourceHttpService],
    exports: [SourceHttpService],
})
export class SourceHttpModule { }
