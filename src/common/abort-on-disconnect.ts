import type { Response } from 'express';

export interface DisconnectSignal {
  signal: AbortSignal;
  release(): void;
}

/**
 * Aborts when the client goes away before the response is written, so an
 * in-flight LLM call can be dropped.
 */
export function abortOnDisconnect(res: Response): DisconnectSignal {
  const controller = new AbortController();
  const onClose = () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  };
  res.on('close', onClose);

  return {
    signal: controller.signal,
    release: () => {
      res.off('close', onClose);
    },
  };
}
