import { User } from "../entities";

export interface AuthenticatedRequest {
  headers: { authorization?: string };
  user?: User;
}
