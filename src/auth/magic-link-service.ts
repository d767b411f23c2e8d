import crypto from 'crypto';
import { MagicLinkRepository, UserRepository } from '../db/types/repository';
import { User } from '../db/types';
import { NotificationAdapter } from '../system/notification';
import { AppError } from '../utils/error-handler';
import { AppLogger, createAuthLogger } from '../utils/logger';

export const LOGIN_EMAIL_SUBJECT = 'Your login link for Make Arjo Work';

export interface MagicLinkOptions {
  /** Public base URL; links are `<domain>/auth/<token>` */
  domain: string;
  allowedEmailDomain: string;
  ttlMinutes: number;

  /** Log the link when it cannot be mailed (development) */
  logUndeliveredLinks: boolean;
}

export interface LinkRequestResult {
  email: string;
  delivered: boolean;
}

/**
 * 32 random bytes, URL-safe base64
 */
export function generateToken(): string {
  return crypto.randomBytes(32).toString('base64url');
}

export function buildLoginEmail(link: string, ttlMinutes: number): string {
  return [
    'Click the link below to log in to Make Arjo Work:',
    '',
    link,
    '',
    `This link expires in ${ttlMinutes} minutes. If you did not ask for it, ignore this email.`
  ].join('\n');
}

/**
 * Passwordless login through single-use emailed links
 */
export class MagicLinkService {
  private readonly logger: AppLogger;

  constructor(
    private readonly users: UserRepository,
    private readonly magicLinks: MagicLinkRepository,
    private readonly notifier: NotificationAdapter,
    private readonly options: MagicLinkOptions,
    private readonly clock: () => Date = () => new Date(),
    logger?: AppLogger
  ) {
    this.logger = logger || createAuthLogger();
  }

  /**
   * Lower-cased, trimmed address; validation error when empty or outside the allowed domain
   */
  normalizeEmail(raw: unknown): string {
    const email = typeof raw === 'string' ? raw.trim().toLowerCase() : '';

    if (!email) {
      throw AppError.validation('Email is required', 'requestLink');
    }

    const domain = this.options.allowedEmailDomain.toLowerCase();
    if (!email.endsWith(`@${domain}`)) {
      throw AppError.validation(`Only @${domain} emails are allowed`, 'requestLink');
    }

    return email;
  }

  async requestLink(rawEmail: unknown): Promise<LinkRequestResult> {
    const email = this.normalizeEmail(rawEmail);
    const token = generateToken();
    const expiresAt = new Date(this.clock().getTime() + this.options.ttlMinutes * 60 * 1000);

    await this.magicLinks.create(email, token, expiresAt);

    const link = `${this.options.domain.replace(/\/+$/, '')}/auth/${token}`;
    const result = await this.notifier.send({
      recipient: email,
      title: LOGIN_EMAIL_SUBJECT,
      content: buildLoginEmail(link, this.options.ttlMinutes)
    });

    if (result.success) {
      this.logger.info(`Login link sent to ${email}`, undefined, 'requestLink');
      return { email, delivered: true };
    }

    if (this.options.logUndeliveredLinks) {
      this.logger.warn(`Email not sent (${result.error}); login link for ${email}: ${link}`, undefined, 'requestLink');
    } else {
      this.logger.error(`Failed to send login link to ${email}: ${result.error}`, undefined, undefined, 'requestLink');
    }

    return { email, delivered: false };
  }

  /**
   * Consume a link and return its user, creating the user on first login
   */
  async authenticate(token: string): Promise<User> {
    const link = token ? await this.magicLinks.findValid(token, this.clock()) : null;

    if (!link || !(await this.magicLinks.markUsed(link.id))) {
      throw AppError.authentication('Invalid or expired link', 'authenticate');
    }

    const user = await this.users.findOrCreate(link.email);
    this.logger.info(`User ${user.email} logged in`, undefined, 'authenticate');
    return user;
  }

  /**
   * Delete used and expired links
   */
  async pruneLinks(): Promise<number> {
    return this.magicLinks.deleteExpired(this.clock());
  }
}
