import type { Response } from 'express';

export interface RequestSignal {
  signal: AbortSignal;
  timedOut: () => boolean;
  dispose: () => void;
}

/**
 * Abort signal for work done on behalf of an HTTP request: fires when the
 * deadline passes or the client goes away before the response is written.
 */
export function requestSignal(res: Response, deadlineMs: number): RequestSignal {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`deadline of ${deadlineMs}ms exceeded`));
  }, deadlineMs);

  const onClose = () => {
    if (!res.writableFinished) {
      controller.abort(new Error('client disconnected'));
    }
  };
  res.on('close', onClose);

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      res.off('close', onClose);
    },
  };
}
