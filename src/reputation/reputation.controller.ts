import {
  BadRequestException,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  UseGuards,
} from '@nestjs/common';
import { ApiTags, ApiSecurity, ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';
import { isIP } from 'net';
import { ApiKeyGuard } from '../shared/guards/api-key.guard';
import { ReputationHistoryService } from './storage/reputation-history.service';
import { ResourceTrustService } from './storage/resource-trust.service';
import { REPUTATION_ENGINE } from './interfaces/reputation-engine.interface';
import type { ReputationEngine } from './interfaces/reputation-engine.interface';
import type { AddressReputationReport } from './interfaces/reputation-report.interface';
import { normalizeIp } from './utils/address.utils';

@ApiTags('Reputation')
@ApiSecurity('api-key')
@Controller('api/reputation')
export class ReputationController {
  /* v8 ignore next 5 - false positive on constructor parameter properties */
  constructor(
    @Inject(REPUTATION_ENGINE) private readonly engine: ReputationEngine,
    private readonly historyService: ReputationHistoryService,
    private readonly trustService: ResourceTrustService,
  ) {}

  /**
   * GET /api/reputation/:address
   * Returns stored history and trust for one remote address
   * Requires X-API-Key header
   */
  @Get(':address')
  @UseGuards(ApiKeyGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Get Address Reputation',
    description:
      'Returns the prior trust, aggregated session history and incremental IP trust held for a remote address. ' +
      'Read-only: looking an address up never changes its reputation.',
  })
  @ApiParam({ name: 'address', description: 'IPv4 or IPv6 address', example: '192.0.2.10' })
  @ApiResponse({ status: 200, description: 'Reputation retrieved successfully.' })
  @ApiResponse({ status: 400, description: 'The address is not a valid IP address.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  getReputation(@Param('address') rawAddress: string): AddressReputationReport {
    const address = normalizeIp(rawAddress);

    if (isIP(address) === 0) {
      throw new BadRequestException(`Invalid IP address: ${rawAddress}`);
    }

    const aggregate = this.historyService.aggregate(address);

    return {
      address,
      strategy: this.engine.strategy,
      priorTrust: this.historyService.priorTrust(address),
      samples: aggregate?.samples ?? 0,
      history: aggregate
        ? {
            score: aggregate.score,
            authFailures: aggregate.authFailures,
            authSuccesses: aggregate.authSuccesses,
            resets: aggregate.resets,
            rcptCount: aggregate.rcptCount,
            dataCount: aggregate.dataCount,
            commitCount: aggregate.commitCount,
            rollbackCount: aggregate.rollbackCount,
          }
        : null,
      ipTrust: {
        trust: this.trustService.ipTrust(address),
        known: this.trustService.has('ip', address),
      },
    };
  }
}
