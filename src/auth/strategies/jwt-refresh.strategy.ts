import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { Request } from 'express';
import { ExtractJwt, Strategy } from 'passport-jwt';

export interface RefreshTokenPayload {
  sub: string;
  jti: string;
}

export interface RefreshPrincipal {
  userId: string;
  jti: string;
}

export type RefreshRequest = Request & { user: RefreshPrincipal };

const fromRefreshCarriers = (req: Request): string | null => {
  const header = req.headers['x-refresh-token'];
  if (typeof header === 'string') return header;
  if (Array.isArray(header) && header.length > 0) return header[0];
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'refreshToken' in body && typeof body.refreshToken === 'string') {
    return body.refreshToken;
  }
  return ExtractJwt.fromAuthHeaderAsBearerToken()(req);
};

@Injectable()
export class JwtRefreshStrategy extends PassportStrategy(Strategy, 'jwt-refresh') {
  constructor(config: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromExtractors([fromRefreshCarriers]),
      secretOrKey: config.getOrThrow<string>('JWT_REFRESH_SECRET'),
      ignoreExpiration: false,
    });
  }

  validate(payload: RefreshTokenPayload): RefreshPrincipal {
    return { userId: payload.sub, jti: payload.jti };
  }
}
