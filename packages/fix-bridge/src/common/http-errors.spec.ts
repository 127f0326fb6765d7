import {
  BadGatewayException,
  ConflictException,
  HttpException,
  NotFoundException,
} from '@nestjs/common';
import { DispatchFailedError } from '../dispatch/dispatch.errors';
import { NotificationFailedError } from '../notifications/run-notification.service';
import { FailureKind } from '../resilience/error-classification';
import { CancellationError } from '../resilience/resilience.errors';
import { RunStatus } from '../runs/run.types';
import { InvalidTransitionError, UnknownRunError } from '../runs/runs.errors';
import { toHttpException } from './http-errors';

describe('toHttpException', () => {
  const responseOf = (error: unknown) => {
    const mapped = toHttpException(error);
    if (!(mapped instanceof HttpException)) {
      throw new Error('expected an HttpException');
    }
    return { status: mapped.getStatus(), body: mapped.getResponse(), mapped };
  };

  it('maps unknown runs to 404', () => {
    const { mapped, body } = responseOf(new UnknownRunError('run_1'));

    expect(mapped).toBeInstanceOf(NotFoundException);
    expect(body).toMatchObject({ runId: 'run_1' });
  });

  it('maps invalid transitions to 409 with both statuses', () => {
    const { mapped, body } = responseOf(
      new InvalidTransitionError('run_1', RunStatus.COMPLETED, RunStatus.FAILED),
    );

    expect(mapped).toBeInstanceOf(ConflictException);
    expect(body).toEqual({
      message: 'Invalid transition for run run_1: COMPLETED -> FAILED',
      runId: 'run_1',
      currentStatus: 'COMPLETED',
      requestedStatus: 'FAILED',
    });
  });

  it('maps cancellations to 409', () => {
    const error = new CancellationError('Operation cancelled: client disconnected');

    expect(responseOf(error)).toMatchObject({
      status: 409,
      body: { message: 'Operation cancelled: client disconnected', status: 'CANCELLED' },
    });
  });

  it('maps failed dispatches to 502 with both causes', () => {
    const error = new DispatchFailedError(
      'run_1',
      { kind: FailureKind.TRANSIENT, message: 'agent-api responded 503 to POST /v1/agents/runs' },
      { kind: FailureKind.PERMANENT, message: 'repository-dispatch responded 404' },
    );

    const { mapped, body } = responseOf(error);

    expect(mapped).toBeInstanceOf(BadGatewayException);
    expect(body).toEqual({
      message: error.message,
      runId: 'run_1',
      status: 'FAILED',
      primaryError: 'agent-api responded 503 to POST /v1/agents/runs',
      fallbackError: 'repository-dispatch responded 404',
    });
  });

  it('maps notification failures to 502', () => {
    expect(
      responseOf(new NotificationFailedError('run_1', 'TICK-1', new Error('Jira is down'))),
    ).toMatchObject({ status: 502, body: { runId: 'run_1', correlationKey: 'TICK-1' } });
  });

  it('returns other errors unchanged', () => {
    const error = new Error('boom');
    expect(toHttpException(error)).toBe(error);
  });
});
