/**
 * Runs Controller
 *
 * Endpoints:
 * - POST /api/v1/runs                    Dispatch a fix task directly
 * - GET  /api/v1/runs?correlationKey=    List runs for a ticket
 * - GET  /api/v1/runs/:runId             Run state, plus live remote status
 * - POST /api/v1/runs/:runId/cancel      Cancel a run
 */

import {
  BadRequestException,
  Body,
  Controller,
  GatewayTimeoutException,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Response } from 'express';
import { toHttpException } from '../common/http-errors';
import { requestSignal } from '../common/request-signal';
import { CancellationError } from '../resilience/resilience.errors';
import { loadDispatchSettings } from './dispatch.config';
import { RunRegistryService } from '../runs/run-registry.service';
import { CreateRunDto } from './dto/create-run.dto';
import { TaskDispatcherService } from './task-dispatcher.service';

@Controller('runs')
export class RunsController {
  private readonly deadlineMs: number;

  constructor(
    private readonly dispatcher: TaskDispatcherService,
    private readonly registry: RunRegistryService,
    private readonly configService: ConfigService,
  ) {
    this.deadlineMs = loadDispatchSettings(this.configService).deadlineMs;
  }

  @Post()
  async create(@Body() dto: CreateRunDto, @Res({ passthrough: true }) res: Response) {
    const { signal, timedOut, dispose } = requestSignal(res, this.deadlineMs);
    try {
      const run = await this.dispatcher.dispatch(dto, { signal });
      return { runId: run.runId, status: run.status, usedFallback: run.usedFallback };
    } catch (error) {
      if (error instanceof CancellationError && timedOut()) {
        throw new GatewayTimeoutException(
          `Dispatch for ${dto.correlationKey} did not finish: ${error.message}`,
        );
      }
      throw toHttpException(error);
    } finally {
      dispose();
    }
  }

  @Get()
  async list(@Query('correlationKey') correlationKey?: string) {
    if (!correlationKey) {
      throw new BadRequestException('correlationKey query parameter is required');
    }
    const runs = await this.registry.listByCorrelationKey(correlationKey);
    return { correlationKey, runs };
  }

  @Get(':runId')
  async get(@Param('runId') runId: string) {
    try {
      const { run, remote } = await this.dispatcher.status(runId);
      return { ...run, remote };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post(':runId/cancel')
  @HttpCode(HttpStatus.OK)
  async cancel(@Param('runId') runId: string) {
    try {
      return await this.dispatcher.cancel(runId);
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
