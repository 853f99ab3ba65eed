import { Inject, Injectable, Logger } from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import { InjectRepository } from "@nestjs/typeorm";
import type { SocialProvider } from "@portfolio-valuation/shared";
import * as bcrypt from "bcryptjs";
import { Repository } from "typeorm";
import { User } from "../entities";
import { AccessTokenPayload } from "../types";

export const SOCIAL_PROVIDERS: readonly SocialProvider[] = ["google", "facebook"];

export const isSocialProvider = (value: string): value is SocialProvider =>
  SOCIAL_PROVIDERS.some((provider) => provider === value);

const BCRYPT_ROUNDS = 10;

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @InjectRepository(User) private readonly userRepository: Repository<User>,
    @Inject(JwtService) private readonly jwt: JwtService,
  ) {}

  hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, BCRYPT_ROUNDS);
  }

  verifyPassword(plainPassword: string, hashedPassword: string): Promise<boolean> {
    return bcrypt.compare(plainPassword, hashedPassword);
  }

  createAccessToken(user: Pick<User, "id" | "email">): Promise<string> {
    const payload: AccessTokenPayload = { sub: String(user.id), email: user.email };
    return this.jwt.signAsync(payload);
  }

  /** Active user named by a valid, unexpired token; null otherwise. */
  async verifyToken(token: string): Promise<User | null> {
    let payload: AccessTokenPayload;
    try {
      payload = await this.jwt.verifyAsync<AccessTokenPayload>(token);
    } catch (error) {
      this.logger.warn(`JWT verification failed: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }

    const userId = Number(payload.sub);
    if (!Number.isInteger(userId)) {
      return null;
    }
    return this.userRepository.findOne({ where: { id: userId, isActive: true } });
  }

  getUserByEmail(email: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { email } });
  }

  async authenticate(email: string, password: string): Promise<User | null> {
    const user = await this.getUserByEmail(email);
    if (!user) {
      return null;
    }
    return (await this.verifyPassword(password, user.hashedPassword)) ? user : null;
  }

  async createUser(email: string, password: string, fullName?: string): Promise<User> {
    const hashedPassword = await this.hashPassword(password);
    return this.userRepository.save(
      this.userRepository.create({ email, hashedPassword, fullName: fullName ?? null }),
    );
  }

  /**
   * Stand-in for a provider token exchange: every login through a provider
   * resolves to that provider's fixed demo account.
   */
  async socialLogin(provider: SocialProvider): Promise<User> {
    const email = `demo-${provider}@example.com`;
    const existing = await this.getUserByEmail(email);
    if (existing) {
      return existing;
    }

    const label = `${provider.charAt(0).toUpperCase()}${provider.slice(1)}`;
    const user = await this.createUser(email, "mock-password-not-used", `Demo ${label} User`);
    this.logger.log(`Created new user via ${provider}: ${email}`);
    return user;
  }
}
