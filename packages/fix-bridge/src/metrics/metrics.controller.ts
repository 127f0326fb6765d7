/**
 * Metrics Controller
 *
 * Endpoints:
 * - GET /api/v1/metrics  Prometheus scrape of dispatch, run, circuit and callback metrics
 */

import { Controller, Get, HttpStatus, Res } from '@nestjs/common';
import type { Response } from 'express';
import { MetricsService } from './metrics.service';

@Controller('metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get()
  async scrape(@Res() res: Response): Promise<void> {
    const body = await this.metricsService.getMetrics();
    res.setHeader('Content-Type', this.metricsService.contentType);
    res.setHeader('Cache-Control', 'no-store');
    res.status(HttpStatus.OK).send(body);
  }
}
