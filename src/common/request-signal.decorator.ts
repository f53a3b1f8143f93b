import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Response } from 'express';

export interface ClosableResponse {
  once(event: 'close', listener: () => void): unknown;
  readonly writableFinished: boolean;
}

/**
 * Aborts once the response closes without having been fully written,
 * which is how a client disconnect shows up on the server side.
 */
export function responseAbortSignal(res: ClosableResponse): AbortSignal {
  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableFinished) {
      controller.abort(new Error('Client disconnected'));
    }
  });
  return controller.signal;
}

export const RequestSignal = createParamDecorator((_: unknown, ctx: ExecutionContext): AbortSignal => {
  return responseAbortSignal(ctx.switchToHttp().getResponse<Response>());
});
