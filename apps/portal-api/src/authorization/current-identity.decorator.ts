import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { ERRORS } from '@portal/common/errors';
import { IdentityContext, getIdentity } from './identity-context';

/**
 * Inject the authenticated identity. Only valid on routes that require auth.
 */
export const CurrentIdentity = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): IdentityContext => {
    const identity = getIdentity(ctx.switchToHttp().getRequest<Request>());
    if (!identity) {
      throw ERRORS.Unauthenticated();
    }
    return identity;
  },
);
