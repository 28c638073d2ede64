import { Controller, Get, Module } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { SystemModule } from '../src/system/system.module';
import { SystemController } from '../src/system/system.controller';
import { Roles } from '../src/common/decorators/roles.decorator';
import { Public } from '../src/common/decorators/public.decorator';
import { Role } from '../src/user/enums/role.enum';

@Controller('widgets')
@Roles(Role.ADMIN)
class WidgetsController {
  @Get()
  list() {
    return [];
  }

  @Public()
  @Get(':id')
  one() {
    return {};
  }
}

@Module({ controllers: [WidgetsController] })
class WidgetsModule {}

describe('SystemController', () => {
  let controller: SystemController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [SystemModule, WidgetsModule],
    }).compile();

    controller = module.get<SystemController>(SystemController);
  });

  it('reports health', () => {
    expect(controller.health()).toMatchObject({
      status: 'healthy',
      message: 'LMS Portal API is running',
      version: '1.0.0',
    });
  });

  it('lists every registered route with its access rules', () => {
    const listing = controller.endpoints();

    expect(listing.endpoints.widgets).toEqual([
      { method: 'GET', path: '/api/v1/widgets', handler: 'list', public: false, roles: [Role.ADMIN] },
      { method: 'GET', path: '/api/v1/widgets/:id', handler: 'one', public: true, roles: [Role.ADMIN] },
    ]);
    expect(listing.endpoints.root.map((route) => route.path)).toEqual([
      '/api/v1',
      '/api/v1/endpoints',
      '/api/v1/health',
    ]);
    expect(listing.authentication.obtainToken).toBe('/api/v1/auth/login');
  });
});
