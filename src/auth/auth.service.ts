import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import { User } from '../user/entities/user.entity';
import { UsersService } from '../user/user.service';
import { ConfigService } from '../config/config.service';
import { Role } from '../user/enums/role.enum';
import { ProfileDetail, toProfileDetail } from '../user/user.mapper';
import { parseTokenPayload, TokenPayload } from './token-payload';

export interface LoginResult {
  access_token: string;
  refresh_token: string;
  user: ProfileDetail;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
  ) {}

  async validateUser(username: string, password: string): Promise<User | null> {
    const trimmed = (username || '').trim();
    if (!trimmed) return null;

    const user = await this.usersService.findByUsername(trimmed);
    if (!user) {
      this.logger.debug(`Login rejected: unknown username ${trimmed}`);
      return null;
    }

    const isPasswordValid = await bcrypt.compare(password, user.password);
    if (!isPasswordValid) {
      this.logger.debug(`Login rejected: bad password for ${trimmed}`);
      return null;
    }

    if (!user.isActive) {
      this.logger.debug(`Login rejected: ${trimmed} is inactive`);
      return null;
    }

    return user;
  }

  async login(user: User): Promise<LoginResult> {
    const now = new Date();
    await this.usersService.updateLoginActivity(user.id, now);
    user.lastLoginAt = now;

    const role = user.profile?.role ?? Role.STUDENT;
    this.logger.log(`Login success: ${user.username} (${role})`);

    return {
      access_token: this.signAccess(user, role),
      refresh_token: this.signRefresh(user, role),
      user: toProfileDetail(user),
    };
  }

  async refresh(refreshToken: string): Promise<{ access_token: string }> {
    let decoded: object;
    try {
      decoded = this.jwtService.verify<object>(refreshToken, {
        secret: this.configService.get('JWT_REFRESH_SECRET'),
      });
    } catch {
      throw new UnauthorizedException('Invalid refresh token');
    }

    const payload = parseTokenPayload(decoded, 'refresh');
    if (!payload) throw new UnauthorizedException('Invalid refresh token');

    const user = await this.usersService.findById(payload.sub);
    if (!user || !user.isActive) throw new UnauthorizedException('User inactive');

    return { access_token: this.signAccess(user, user.profile?.role ?? Role.STUDENT) };
  }

  private signAccess(user: User, role: Role): string {
    const payload: TokenPayload = { sub: user.id, username: user.username, role, type: 'access' };
    return this.jwtService.sign(payload);
  }

  private signRefresh(user: User, role: Role): string {
    const payload: TokenPayload = { sub: user.id, username: user.username, role, type: 'refresh' };
    return this.jwtService.sign(payload, {
      secret: this.configService.get('JWT_REFRESH_SECRET'),
      expiresIn: this.configService.getOrDefault('JWT_REFRESH_EXPIRES_IN', '7d'),
    });
  }
}
