/**
 * Auth Service
 * Signup, login, bearer resolution and email confirmation
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { PasswordService } from '@contactbook/common/crypto';
import { JwtService, TokenClaims, TokenPurpose } from '@contactbook/common/jwt';
import { SessionCacheService } from '@contactbook/common/cache';
import { UNIT_OF_WORK, UnitOfWork } from '@contactbook/common/database';
import { ContactBookError, ERRORS, ErrorCode } from '@contactbook/common/errors';
import { toIdentity } from '@contactbook/common/types';
import { ACCOUNT_REPOSITORY, AccountRepository } from '../accounts/account-repository';
import { EmailService } from '../email/email.service';
import { AuthenticatedSession } from './authenticated-session';
import { SignupDto, SignupResponseDto } from './dto/signup.dto';
import { LoginDto, LoginResponseDto } from './dto/login.dto';
import { MessageResponseDto, RequestEmailDto } from './dto/request-email.dto';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private passwordService: PasswordService,
    private jwtService: JwtService,
    private sessionCache: SessionCacheService,
    private emailService: EmailService,
    @Inject(ACCOUNT_REPOSITORY) private accounts: AccountRepository,
    @Inject(UNIT_OF_WORK) private unitOfWork: UnitOfWork,
  ) {}

  /**
   * Create an unconfirmed account and send the confirmation link
   */
  async signup(dto: SignupDto): Promise<SignupResponseDto> {
    const existing = await this.unitOfWork.run((db) =>
      this.accounts.findByUsername(db, dto.username),
    );
    if (existing) {
      throw ERRORS.AccountExists(dto.username);
    }

    const passwordHash = await this.passwordService.hash(dto.password);

    // create() maps a concurrent duplicate insert to AccountExists as well
    const account = await this.unitOfWork.run((db) =>
      this.accounts.create(db, { username: dto.username, passwordHash }),
    );

    this.logger.log(`Account created: ${account.id}`);
    this.dispatchConfirmation(account.username);

    return { new_user: account.username };
  }

  /**
   * Verify credentials and issue a session token.
   * The identity snapshot is written through to the session cache.
   */
  async login(dto: LoginDto): Promise<LoginResponseDto> {
    const account = await this.unitOfWork.run((db) =>
      this.accounts.findByUsername(db, dto.username),
    );
    if (!account) {
      this.logger.warn('Login rejected: unknown username');
      throw ERRORS.UnknownUser();
    }

    const isValid = await this.passwordService.verify(account.password_hash, dto.password);
    if (!isValid) {
      this.logger.warn(`Login rejected for account ${account.id}: bad password`);
      throw ERRORS.BadPassword();
    }

    if (!account.confirmed) {
      this.logger.warn(`Login rejected for account ${account.id}: email unconfirmed`);
      throw ERRORS.EmailUnconfirmed();
    }

    const { token, claims } = this.jwtService.createSessionToken(account.username);
    await this.sessionCache.put(
      token,
      toIdentity(account),
      this.jwtService.secondsUntilExpiry(claims),
    );

    this.logger.log(`Account logged in: ${account.id}`);

    return { access_token: token, token_type: 'bearer' };
  }

  /**
   * Resolve a bearer token to an identity: cache first, then the
   * durable store. A miss repopulates the cache for the rest of the
   * token's lifetime.
   */
  async resolveBearer(token: string): Promise<AuthenticatedSession> {
    let claims: TokenClaims;
    try {
      claims = this.jwtService.verifyToken(token, TokenPurpose.SESSION);
    } catch (error) {
      throw collapseTokenError(error, ERRORS.Unauthenticated);
    }

    const cached = await this.sessionCache.get(token);
    if (cached) {
      return { token, claims, identity: cached };
    }

    const account = await this.unitOfWork.run((db) =>
      this.accounts.findByUsername(db, claims.sub),
    );
    if (!account) {
      this.logger.warn('Bearer rejected: token subject no longer exists');
      throw ERRORS.Unauthenticated();
    }

    const identity = toIdentity(account);
    await this.sessionCache.put(token, identity, this.jwtService.secondsUntilExpiry(claims));

    return { token, claims, identity };
  }

  /**
   * Mark the token subject's email as confirmed (idempotent)
   */
  async confirmEmail(token: string): Promise<MessageResponseDto> {
    let claims: TokenClaims;
    try {
      claims = this.jwtService.verifyToken(token, TokenPurpose.EMAIL_CONFIRMATION);
    } catch (error) {
      throw collapseTokenError(error, ERRORS.VerificationError);
    }

    return this.unitOfWork.run(async (db) => {
      const account = await this.accounts.findByUsername(db, claims.sub);
      if (!account) {
        this.logger.warn('Email confirmation rejected: token subject not found');
        throw ERRORS.VerificationError();
      }

      if (account.confirmed) {
        return { message: 'Your email is already confirmed' };
      }

      await this.accounts.markConfirmed(db, account.id);
      this.logger.log(`Email confirmed for account ${account.id}`);

      return { message: 'Your email is confirmed' };
    });
  }

  /**
   * Re-send the confirmation link. The response does not reveal whether
   * the account exists or is already confirmed.
   */
  async requestConfirmationEmail(dto: RequestEmailDto): Promise<MessageResponseDto> {
    const account = await this.unitOfWork.run((db) =>
      this.accounts.findByUsername(db, dto.email),
    );

    if (account && !account.confirmed) {
      this.dispatchConfirmation(account.username);
    }

    return { message: 'Check your email for confirmation.' };
  }

  /**
   * Fire-and-forget: signup does not wait for delivery
   */
  private dispatchConfirmation(username: string): void {
    const { token } = this.jwtService.createConfirmationToken(username);

    this.emailService.sendConfirmation(username, username, token).catch((error: unknown) => {
      this.logger.error(
        `Confirmation email for ${username} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    });
  }
}

/**
 * Token failures collapse into one caller-facing error; anything else
 * is unexpected and propagates as is.
 */
function collapseTokenError(
  error: unknown,
  toPublic: (e?: Error) => ContactBookError,
): unknown {
  if (ContactBookError.is(error, ErrorCode.TokenInvalid, ErrorCode.TokenExpired)) {
    return toPublic(error);
  }
  return error;
}
