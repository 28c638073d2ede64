import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '../config/config.service';
import { Caller } from '../common/access/caller';
import { CallerService } from './caller.service';
import { parseTokenPayload } from './token-payload';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    private readonly callerService: CallerService,
    configService: ConfigService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.get('JWT_SECRET'),
    });
  }

  // Whatever this returns becomes request.user
  async validate(payload: unknown): Promise<Caller> {
    const parsed = parseTokenPayload(payload, 'access');
    if (!parsed) throw new UnauthorizedException('Invalid token');

    const caller = await this.callerService.resolve(parsed.sub);
    if (!caller) throw new UnauthorizedException('User not found or inactive');
    return caller;
  }
}
