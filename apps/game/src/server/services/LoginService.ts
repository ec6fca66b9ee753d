import jwt, { TokenExpiredError, type JwtPayload, type SignOptions } from "jsonwebtoken";
import { z } from "zod";

export class LoginFailedError extends Error {
  constructor(
    public readonly code: number,
    public readonly msg: string
  ) {
    super(msg);
    this.name = "LoginFailedError";
  }
}

const tokenClaimsSchema = z.object({
  id: z.number().int().positive()
});

export interface LoginServiceDependencies {
  jwtSecret: string;
}

/**
 * Service for login token verification.
 * Tokens are HS256 JWTs whose `id` claim is the player's actor id.
 */
export class LoginService {
  constructor(private readonly deps: LoginServiceDependencies) {}

  /**
   * Verifies a login token and returns the player's actor id.
   *
   * @throws LoginFailedError if the token is invalid, expired or carries no id
   */
  verifyLogin(token: string): number {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.deps.jwtSecret, { algorithms: ["HS256"] });
    } catch (err) {
      const reason = err instanceof TokenExpiredError ? "Login token expired" : "Invalid login token";
      throw new LoginFailedError(-1, reason);
    }

    const claims = tokenClaimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new LoginFailedError(-1, "Invalid login token");
    }
    return claims.data.id;
  }

  /**
   * Signs a login token for a player actor id.
   *
   * @example
   * const token = loginService.issueToken(42);
   * loginService.verifyLogin(token); // 42
   */
  issueToken(actorId: number, expiresIn: SignOptions["expiresIn"] = "7d"): string {
    return jwt.sign({ id: actorId }, this.deps.jwtSecret, { algorithm: "HS256", expiresIn });
  }
}
