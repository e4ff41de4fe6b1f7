import { CustomDecorator, SetMetadata } from '@nestjs/common';

export const TIMEOUT_KEY = 'request-timeout-ms';

/**
 * Overrides the TimeoutInterceptor deadline for a handler or controller
 */
export const Timeout = (timeoutMs: number): CustomDecorator<string> =>
  SetMetadata(TIMEOUT_KEY, timeoutMs);
