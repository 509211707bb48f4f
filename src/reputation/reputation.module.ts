import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MetricsModule } from '../metrics/metrics.module';
import { ReputationStrategy, DEFAULT_REPUTATION_STRATEGY } from '../config/config.constants';
import { REPUTATION_ENGINE } from './interfaces/reputation-engine.interface';
import type { ReputationEngine } from './interfaces/reputation-engine.interface';
import { ReputationHistoryService } from './storage/reputation-history.service';
import { ResourceTrustService } from './storage/resource-trust.service';
import { HistoricalReputationEngine } from './engines/historical-reputation.engine';
import { IncrementalReputationEngine } from './engines/incremental-reputation.engine';
import { ReputationHandlerService } from './reputation-handler.service';
import { ReputationController } from './reputation.controller';

@Module({
  imports: [MetricsModule],
  controllers: [ReputationController],
  providers: [
    ReputationHistoryService,
    ResourceTrustService,
    HistoricalReputationEngine,
    IncrementalReputationEngine,
    {
      provide: REPUTATION_ENGINE,
      inject: [ConfigService, HistoricalReputationEngine, IncrementalReputationEngine],
      useFactory: (
        config: ConfigService,
        historical: HistoricalReputationEngine,
        incremental: IncrementalReputationEngine,
      ): ReputationEngine => {
        const strategy = config.get<ReputationStrategy>('reputation.strategy') ?? DEFAULT_REPUTATION_STRATEGY;
        return strategy === ReputationStrategy.INCREMENTAL ? incremental : historical;
      },
    },
    ReputationHandlerService,
  ],
  exports: [ReputationHandlerService, ReputationHistoryService, ResourceTrustService],
})
export class ReputationModule {}
