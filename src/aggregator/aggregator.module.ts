import { Module } from '@nestjs/common';
import { SourcesModule } from '../sources/sources.module';
import { SnapshotAggregatorService } from './snapshot-aggregator.service';

@Module({
    imports: [SourcesModule],
    providers: [SnapshotAggregatorService],
    exports: [SnapshotAggregatorService],
})
export class AggregatorModule { }
