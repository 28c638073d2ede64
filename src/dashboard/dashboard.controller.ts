import { Controller, Get, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../auth/guards/roles.guard';
import { CurrentCaller } from '../common/decorators/current-caller.decorator';
import { Caller } from '../common/access/caller';
import { DashboardService, DashboardStats } from './dashboard.service';

@ApiTags('Dashboard')
@ApiBearerAuth()
@Controller('dashboard')
@UseGuards(JwtAuthGuard, RolesGuard)
export class DashboardController {
  constructor(private readonly dashboardService: DashboardService) {}

  @Get('stats')
  @ApiOperation({ summary: "Counters for the caller's role" })
  getDashboardStats(@CurrentCaller() caller: Caller): Promise<DashboardStats> {
    return this.dashboardService.statsFor(caller);
  }
}
