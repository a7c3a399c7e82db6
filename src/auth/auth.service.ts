import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import { randomUUID } from 'crypto';
import { DomainError, ErrorKind } from '../common/errors';
import { normalizePhone, tryNormalizePhone } from '../common/utils/phone.util';
import { User, UserRole } from '../database/schema';
import { Store } from '../database/store';
import { LoginDto, RegisterDto } from './dto/auth.dto';
import { AccessTokenPayload } from './strategies/jwt.strategy';
import { RefreshTokenPayload } from './strategies/jwt-refresh.strategy';

export interface SafeUser {
  id: string;
  username: string;
  phone: string;
  email: string | null;
  role: UserRole;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  expiresInSeconds: number;
}

export interface AuthResult extends TokenPair {
  user: SafeUser;
}

interface ClientMetadata {
  ip?: string;
  userAgent?: string;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly store: Store,
    private readonly jwt: JwtService,
    private readonly config: ConfigService,
  ) {}

  async register(dto: RegisterDto): Promise<AuthResult> {
    const phone = normalizePhone(dto.phone);
    const username = dto.username?.trim() || phone;
    const email = dto.email?.trim().toLowerCase() || null;
    const role = dto.accountType ?? 'customer';
    const passwordHash = await bcrypt.hash(dto.password, this.bcryptRounds());

    const user = await this.store.transaction(async (tx) => {
      if (await tx.users.findConflicting({ username, phone, email })) {
        throw new DomainError(ErrorKind.CONFLICT, 'A user with this phone, username or email already exists');
      }
      const created = await tx.users.insert({ username, phone, email, passwordHash, role });
      if (role === 'customer') {
        await tx.customers.insertProfile({ userId: created.id });
      }
      return created;
    });
    this.logger.log({ msg: 'User registered', userId: user.id, role });
    return { user: toSafeUser(user), ...(await this.issueTokens(user)) };
  }

  async login(dto: LoginDto, metadata: ClientMetadata): Promise<AuthResult> {
    const identifier = dto.identifier.trim();
    const user = await this.store.transaction(async (tx) => {
      for (const candidate of loginCandidates(identifier)) {
        const found = await tx.users.findByIdentifier(candidate);
        if (found) return found;
      }
      return undefined;
    });
    if (!user) {
      this.logger.warn({ msg: 'Login failed - user not found', ip: metadata.ip });
      throw new DomainError(ErrorKind.UNAUTHORIZED, 'Invalid credentials');
    }
    if (!(await bcrypt.compare(dto.password, user.passwordHash))) {
      this.logger.warn({ msg: 'Login failed - bad password', userId: user.id, ip: metadata.ip });
      throw new DomainError(ErrorKind.UNAUTHORIZED, 'Invalid credentials');
    }
    if (!user.isActive) {
      this.logger.warn({ msg: 'Login failed - account disabled', userId: user.id, ip: metadata.ip });
      throw new DomainError(ErrorKind.UNAUTHORIZED, 'Account is not active');
    }
    this.logger.log({ msg: 'Login success', userId: user.id, ip: metadata.ip, userAgent: metadata.userAgent });
    return { user: toSafeUser(user), ...(await this.issueTokens(user)) };
  }

  /** Rotates the session: the presented jti is revoked and a fresh pair issued. */
  async refresh(userId: string, jti: string): Promise<TokenPair> {
    const now = new Date();
    const user = await this.store.transaction(async (tx) => {
      const session = await tx.refreshSessions.findByJti(jti);
      if (!session || session.userId !== userId) {
        throw new DomainError(ErrorKind.UNAUTHORIZED, 'Refresh token is not recognized');
      }
      if (session.revokedAt) {
        this.logger.warn({ msg: 'Refresh token reuse detected', userId, jti });
        throw new DomainError(ErrorKind.UNAUTHORIZED, 'Refresh token has been revoked');
      }
      if (session.expiresAt.getTime() <= now.getTime()) {
        throw new DomainError(ErrorKind.UNAUTHORIZED, 'Refresh token has expired');
      }
      const owner = await tx.users.findById(userId);
      if (!owner || !owner.isActive) {
        throw new DomainError(ErrorKind.UNAUTHORIZED, 'Account is not active');
      }
      await tx.refreshSessions.revoke(jti, now);
      return owner;
    });
    return this.issueTokens(user);
  }

  async logout(userId: string, jti: string): Promise<{ loggedOut: true }> {
    await this.store.transaction(async (tx) => {
      const session = await tx.refreshSessions.findByJti(jti);
      if (session && session.userId === userId && !session.revokedAt) {
        await tx.refreshSessions.revoke(jti, new Date());
      }
    });
    this.logger.log({ msg: 'Logout', userId });
    return { loggedOut: true };
  }

  private async issueTokens(user: User): Promise<TokenPair> {
    const accessTtl = this.config.get<number>('JWT_ACCESS_TTL') ?? 900;
    const refreshTtl = this.config.get<number>('JWT_REFRESH_TTL') ?? 1209600;
    const jti = randomUUID();

    const accessPayload: AccessTokenPayload = { sub: user.id, role: user.role, phone: user.phone };
    const refreshPayload: RefreshTokenPayload = { sub: user.id, jti };
    const [accessToken, refreshToken] = await Promise.all([
      this.jwt.signAsync(accessPayload, {
        secret: this.config.getOrThrow<string>('JWT_ACCESS_SECRET'),
        expiresIn: accessTtl,
      }),
      this.jwt.signAsync(refreshPayload, {
        secret: this.config.getOrThrow<string>('JWT_REFRESH_SECRET'),
        expiresIn: refreshTtl,
      }),
    ]);
    await this.store.transaction((tx) =>
      tx.refreshSessions.insert({
        jti,
        userId: user.id,
        expiresAt: new Date(Date.now() + refreshTtl * 1000),
      }),
    );
    return { accessToken, refreshToken, expiresInSeconds: accessTtl };
  }

  private bcryptRounds() {
    return this.config.get<number>('BCRYPT_ROUNDS') ?? 10;
  }
}

function toSafeUser(user: User): SafeUser {
  return { id: user.id, username: user.username, phone: user.phone, email: user.email, role: user.role };
}

function loginCandidates(identifier: string): string[] {
  const candidates = new Set([identifier, identifier.toLowerCase()]);
  const phone = tryNormalizePhone(identifier);
  if (phone) candidates.add(phone);
  return [...candidates];
}
