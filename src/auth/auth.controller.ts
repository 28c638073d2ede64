import {
  Controller,
  Post,
  Body,
  UseGuards,
  Request,
  UnauthorizedException,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { Request as ExpressRequest } from 'express';
import { AuthService, LoginResult } from './auth.service';
import { UsersService, RegisterResult } from '../user/user.service';
import { Public } from '../common/decorators/public.decorator';
import { Roles } from '../common/decorators/roles.decorator';
import { CurrentCaller } from '../common/decorators/current-caller.decorator';
import { Caller } from '../common/access/caller';
import { Role } from '../user/enums/role.enum';
import { User } from '../user/entities/user.entity';
import { LoginDto, RefreshTokenDto } from '../user/dtos/login.dto';
import { RegisterUserDto } from '../user/dtos/register-user.dto';
import { LocalAuthGuard } from './guards/local-auth.guard';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { RolesGuard } from './guards/roles.guard';

@ApiTags('Auth')
@Controller('auth')
@UseGuards(JwtAuthGuard, RolesGuard)
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly usersService: UsersService,
  ) {}

  @Public()
  @UseGuards(LocalAuthGuard)
  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange username and password for access and refresh tokens' })
  async login(@Body() _loginDto: LoginDto, @Request() req: ExpressRequest): Promise<LoginResult> {
    const user: unknown = req.user;
    if (!(user instanceof User)) {
      throw new UnauthorizedException('Invalid credentials');
    }
    return this.authService.login(user);
  }

  @Public()
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Issue a new access token from a refresh token' })
  refresh(@Body() dto: RefreshTokenDto): Promise<{ access_token: string }> {
    return this.authService.refresh(dto.refresh_token);
  }

  @Post('register')
  @Roles(Role.ADMIN)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Create an account with its profile and role record' })
  register(@CurrentCaller() caller: Caller, @Body() dto: RegisterUserDto): Promise<RegisterResult> {
    return this.usersService.register(caller, dto);
  }
}
