/**
 * Runs the authorization gate before route dispatch. Routes missing from the
 * table pass through untouched.
 */

import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { ERRORS, PortalError } from '@portal/common/errors';
import { AuthorizationGate, GateFailure } from './authorization.gate';
import { RouteTableExplorer } from './route-table.explorer';
import { attachIdentity } from './identity-context';

export function toPortalError(failure: GateFailure): PortalError {
  switch (failure.kind) {
    case 'Unauthenticated':
      return ERRORS.Unauthenticated(failure.reason);
    case 'InvalidCredential':
      return ERRORS.TokenInvalid(failure.reason);
    case 'Forbidden':
      return ERRORS.Forbidden(failure.missing, failure.mode);
  }
}

@Injectable()
export class AuthorizationMiddleware implements NestMiddleware {
  constructor(
    private routeTableExplorer: RouteTableExplorer,
    private gate: AuthorizationGate,
  ) {}

  async use(req: Request, _res: Response, next: NextFunction) {
    const path = req.originalUrl.split('?')[0];
    const route = this.routeTableExplorer.getTable().lookup(req.method, path);
    if (!route) {
      return next();
    }

    const result = await this.gate.authorize(route, req.headers.authorization);
    if (!result.ok) {
      throw toPortalError(result.error);
    }

    if (result.value) {
      attachIdentity(req, result.value);
    }
    next();
  }
}
