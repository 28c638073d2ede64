import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';
import { Caller, isCaller } from '../access/caller';

export const CurrentCaller = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Caller => {
    const request = ctx.switchToHttp().getRequest<Request>();
    const user: unknown = request.user;
    if (!isCaller(user)) {
      throw new UnauthorizedException();
    }
    return user;
  },
);
