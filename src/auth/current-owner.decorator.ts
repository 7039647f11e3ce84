import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { Request } from 'express';
import { AuthenticatedOwner } from './jwt.strategy';

type OwnerRequest = Request & { user?: AuthenticatedOwner };

/** Id del propietario autenticado (sub del JWT). */
export const CurrentOwner = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const req = ctx.switchToHttp().getRequest<OwnerRequest>();
    const ownerId = req.user?.ownerId;
    if (!ownerId) throw new UnauthorizedException();
    return ownerId;
  },
);
