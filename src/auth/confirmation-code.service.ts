import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomBytes, timingSafeEqual } from 'crypto';
import { EntityManager } from 'typeorm';
import { UnauthenticatedError, ValidationError } from '../common/errors';
import { UnitOfWork } from '../common/unit-of-work';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { User } from '../database/entities';
import { CodeDeliveryChannel } from './code-delivery';
import { TokenService } from './token.service';

const CODE_BYTES = 12;

export function generateConfirmationCode(): string {
  return randomBytes(CODE_BYTES).toString('base64url');
}

function codesMatch(stored: string | null, given: string): boolean {
  if (stored === null) {
    return false;
  }
  const expected = Buffer.from(stored);
  const actual = Buffer.from(given);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

@Injectable()
export class ConfirmationCodeService {
  private readonly logger = new Logger(ConfirmationCodeService.name);

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly delivery: CodeDeliveryChannel,
    private readonly tokens: TokenService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * Stores a fresh code for the user identified by both email and username,
   * then hands it to the delivery channel once the store has committed.
   */
  async issueCode(email: string, username: string): Promise<string> {
    const code = await this.unitOfWork.run(async (manager) => {
      const user = await manager.findOne(User, { where: { username } });
      if (!user || user.email !== email) {
        throw new ValidationError('No user matches this email and username');
      }
      return this.assignCode(manager, user);
    });

    await this.deliver(email, code);
    return code;
  }

  /** Replaces the user's stored code within the caller's transaction. */
  async assignCode(manager: EntityManager, user: User): Promise<string> {
    const code = generateConfirmationCode();
    user.confirmationCode = code;
    user.confirmationCodeExpiresAt = new Date(
      Date.now() + this.config.auth.codeTtlMinutes * 60_000,
    );
    await manager.save(user);
    return code;
  }

  /**
   * Trades a valid code for a session token. The code is cleared in the same
   * step, so a second exchange with it fails.
   */
  async exchange(username: string, code: string): Promise<string> {
    const user = await this.unitOfWork.run(async (manager) => {
      const user = await manager.findOne(User, { where: { username } });
      if (
        !user ||
        !codesMatch(user.confirmationCode, code) ||
        this.isExpired(user.confirmationCodeExpiresAt)
      ) {
        throw new UnauthenticatedError('Invalid username or confirmation code');
      }

      const result = await manager.update(
        User,
        { id: user.id, confirmationCode: code },
        { confirmationCode: null, confirmationCodeExpiresAt: null },
      );
      if (result.affected === 0) {
        throw new UnauthenticatedError('Invalid username or confirmation code');
      }
      return user;
    });

    this.logger.log(`Issued token for ${user.username}`);
    return this.tokens.issue(user);
  }

  private isExpired(expiresAt: Date | null): boolean {
    return expiresAt !== null && expiresAt.getTime() <= Date.now();
  }

  /** Best effort: a failed delivery is logged and leaves stored state alone. */
  async deliver(email: string, code: string): Promise<void> {
    try {
      await this.delivery.deliver(email, code);
    } catch (error) {
      this.logger.warn(
        `Confirmation code delivery to ${email} failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }
}
