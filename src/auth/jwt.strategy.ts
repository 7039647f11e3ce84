import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';

export type JwtPayload = { sub?: string | number; email?: string };

/** Lo que queda en req.user: toda consulta se filtra por ownerId. */
export type AuthenticatedOwner = { ownerId: string; email?: string };

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(cfg: ConfigService) {
    const secret = cfg.get<string>('JWT_SECRET');
    if (!secret) throw new Error('JWT_SECRET is not defined');
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: secret,
    });
  }

  validate(payload: JwtPayload): AuthenticatedOwner {
    if (payload.sub === undefined || payload.sub === '') {
      throw new UnauthorizedException('Token without subject');
    }
    return { ownerId: String(payload.sub), email: payload.email };
  }
}
