import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Public } from '../common/decorators/public.decorator';
import { Role } from '../user/enums/role.enum';
import { API_PREFIX, RouteCatalog, RouteMeta } from './route-catalog';

export const API_VERSION = '1.0.0';

export interface HealthStatus {
  status: 'healthy';
  message: string;
  version: string;
  timestamp: string;
}

export interface EndpointListing {
  message: string;
  version: string;
  endpoints: Record<string, RouteMeta[]>;
  authentication: { type: string; header: string; obtainToken: string };
  permissions: Record<Role, string>;
}

const PERMISSIONS: Record<Role, string> = {
  [Role.ADMIN]: 'Full access to all resources',
  [Role.TEACHER]: 'Access to assigned classes, their students, and own assignments, grades and attendance',
  [Role.STUDENT]: 'Read access to own class, assignments, grades and attendance',
  [Role.STAFF]: 'Read access to school records',
};

@ApiTags('System')
@Controller()
export class SystemController {
  constructor(private readonly routeCatalog: RouteCatalog) {}

  @Public()
  @Get('health')
  @ApiOperation({ summary: 'Liveness check' })
  health(): HealthStatus {
    return {
      status: 'healthy',
      message: 'LMS Portal API is running',
      version: API_VERSION,
      timestamp: new Date().toISOString(),
    };
  }

  @Public()
  @Get(['', 'endpoints'])
  @ApiOperation({ summary: 'List available endpoints' })
  endpoints(): EndpointListing {
    return {
      message: 'LMS Portal API v1',
      version: API_VERSION,
      endpoints: this.routeCatalog.grouped(),
      authentication: {
        type: 'JWT Bearer Token',
        header: 'Authorization: Bearer <token>',
        obtainToken: `/${API_PREFIX}/auth/login`,
      },
      permissions: PERMISSIONS,
    };
  }
}
