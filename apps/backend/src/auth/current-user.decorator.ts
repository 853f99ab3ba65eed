import { createParamDecorator, ExecutionContext, UnauthorizedException } from "@nestjs/common";
import { User } from "../entities";
import { AuthenticatedRequest } from "./authenticated-request";

export const CurrentUser = createParamDecorator((_data: unknown, context: ExecutionContext): User => {
  const { user } = context.switchToHttp().getRequest<AuthenticatedRequest>();
  if (!user) {
    throw new UnauthorizedException("Invalid or expired token");
  }
  return user;
});
