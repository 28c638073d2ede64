import { Controller, ExecutionContext, Get } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { RolesGuard } from './roles.guard';
import { Roles } from '../../common/decorators/roles.decorator';
import { Public } from '../../common/decorators/public.decorator';
import { Role } from '../../user/enums/role.enum';
import { adminCaller, staffCaller } from '../../../test/support/callers';

@Controller('fixtures')
@Roles(Role.ADMIN)
class FixtureController {
  @Get()
  adminOnly() {
    return 'ok';
  }

  @Public()
  @Get('open')
  open() {
    return 'ok';
  }

  @Roles(Role.ADMIN, Role.STAFF)
  @Get('shared')
  shared() {
    return 'ok';
  }
}

function contextFor(handler: () => string, user: unknown): ExecutionContext {
  const context = {
    getHandler: () => handler,
    getClass: () => FixtureController,
    switchToHttp: () => ({ getRequest: () => ({ user }) }),
  };
  return context as unknown as ExecutionContext;
}

describe('RolesGuard', () => {
  const guard = new RolesGuard(new Reflector());
  const proto = FixtureController.prototype;

  it('applies class-level roles', () => {
    expect(guard.canActivate(contextFor(proto.adminOnly, adminCaller))).toBe(true);
    expect(guard.canActivate(contextFor(proto.adminOnly, staffCaller))).toBe(false);
  });

  it('lets handler roles override the class', () => {
    expect(guard.canActivate(contextFor(proto.shared, staffCaller))).toBe(true);
  });

  it('lets public routes through without a caller', () => {
    expect(guard.canActivate(contextFor(proto.open, undefined))).toBe(true);
  });

  it('refuses a request whose user is not a resolved caller', () => {
    expect(guard.canActivate(contextFor(proto.adminOnly, { id: 'u1' }))).toBe(false);
  });
});
