import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { DomainError, ErrorKind } from '../../common/errors';
import { CurrentUserPayload, isUserRole } from '../../common/types/current-user.type';

export interface AccessTokenPayload {
  sub: string;
  role: string;
  phone: string;
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(config: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      secretOrKey: config.getOrThrow<string>('JWT_ACCESS_SECRET'),
      ignoreExpiration: false,
    });
  }

  validate(payload: AccessTokenPayload): CurrentUserPayload {
    if (!isUserRole(payload.role)) {
      throw new DomainError(ErrorKind.UNAUTHORIZED, 'Invalid token');
    }
    return { userId: payload.sub, role: payload.role, phone: payload.phone };
  }
}
