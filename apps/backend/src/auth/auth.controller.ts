import { BadRequestException, Body, Controller, HttpCode, Inject, Logger, Post, Query, UnauthorizedException } from "@nestjs/common";
import type { SocialTokenResponse, TokenResponse } from "@portfolio-valuation/shared";
import { LoginDto } from "../dto/login.dto";
import { AuthService, isSocialProvider } from "../services/auth.service";

@Controller("auth")
export class AuthController {
  private readonly logger = new Logger(AuthController.name);

  constructor(@Inject(AuthService) private readonly auth: AuthService) {}

  @Post("login")
  @HttpCode(200)
  async login(@Body() body: LoginDto): Promise<TokenResponse> {
    this.logger.log(`Login attempt for user: ${body.email}`);
    const user = await this.auth.authenticate(body.email, body.password);
    if (!user) {
      this.logger.warn(`Failed login attempt for: ${body.email}`);
      throw new UnauthorizedException("Incorrect email or password");
    }

    const accessToken = await this.auth.createAccessToken(user);
    this.logger.log(`Successful login for user: ${body.email}`);
    return { access_token: accessToken, token_type: "bearer" };
  }

  @Post("social")
  @HttpCode(200)
  async socialLogin(@Query("provider") provider?: string): Promise<SocialTokenResponse> {
    if (!provider || !isSocialProvider(provider)) {
      throw new BadRequestException("Invalid provider. Must be 'google' or 'facebook'");
    }

    const user = await this.auth.socialLogin(provider);
    const accessToken = await this.auth.createAccessToken(user);
    this.logger.log(`Successful ${provider} login for: ${user.email}`);
    return { access_token: accessToken, token_type: "bearer", provider };
  }
}
