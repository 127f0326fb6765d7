/**
 * Health Controller
 *
 * Endpoints:
 * - GET  /api/v1/health                              Breaker states and configuration
 * - POST /api/v1/health/circuits/:dependency/reset   Close a breaker by hand
 */

import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { HealthCheck, HealthCheckResult, HealthCheckService } from '@nestjs/terminus';
import { CircuitBreakerRegistry } from '../resilience/circuit-breaker.registry';
import { DispatchHealthIndicator } from './dispatch-health.indicator';

@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly health: HealthCheckService,
    private readonly dispatchHealth: DispatchHealthIndicator,
    private readonly breakers: CircuitBreakerRegistry,
  ) {}

  @Get()
  @HealthCheck()
  async check(): Promise<HealthCheckResult> {
    return this.health.check([
      () => this.dispatchHealth.checkCircuits('circuits'),
      () => this.dispatchHealth.checkConfiguration('configuration'),
    ]);
  }

  @Post('circuits/:dependency/reset')
  @HttpCode(HttpStatus.OK)
  async resetCircuit(@Param('dependency') dependency: string) {
    const reset = await this.breakers.reset(dependency);
    if (!reset) {
      throw new NotFoundException(`No circuit breaker for ${dependency}`);
    }
    this.logger.warn(`Circuit breaker for ${dependency} reset by request`);
    return { dependency, state: this.breakers.get(dependency).getSnapshot().state };
  }
}
