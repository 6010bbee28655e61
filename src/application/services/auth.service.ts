import type { AuthResult, LoginCommand, RegisterCommand } from "../../core/entities/auth.js";
import { Password } from "../../core/entities/password.js";
import type { AppError } from "../../core/errors/app-error.js";
import { ErrorCode, invalidCredentials } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { PasswordHasher } from "../../core/ports/password-hasher.js";
import type { TokenService } from "../../core/ports/token-service.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { type Result, err, ok } from "../../core/types/result.js";

export interface AuthService {
  register(cmd: RegisterCommand): Promise<Result<AuthResult, AppError>>;
  login(cmd: LoginCommand): Promise<Result<AuthResult, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly passwordHasher: PasswordHasher;
  readonly tokenService: TokenService;
  readonly logger: Logger;
}

export const createAuthService = (deps: Deps): AuthService => {
  const { userRepo, passwordHasher, tokenService, logger } = deps;

  // Verified against when the email is unknown, so both failure paths pay for one Argon2 run.
  let decoy: Promise<Password | null> | undefined;
  const decoyPassword = (): Promise<Password | null> => {
    decoy ??= Password.hash("decoy-password-never-matches", passwordHasher).then((r) =>
      r.ok ? r.value : null,
    );
    return decoy;
  };

  return {
    async register(cmd: RegisterCommand): Promise<Result<AuthResult, AppError>> {
      logger.info("Registering user", { username: cmd.username });

      const hashResult = await Password.hash(cmd.password, passwordHasher);
      if (!hashResult.ok) {
        logger.error("Password hashing failed during registration", { cause: hashResult.error.cause });
        return hashResult;
      }

      // No pre-check: the UNIQUE constraints decide.
      const createResult = await userRepo.create({
        username: cmd.username,
        email: cmd.email,
        passwordHash: hashResult.value.expose(),
      });
      if (!createResult.ok) {
        if (createResult.error.code === ErrorCode.USER_ALREADY_EXISTS) {
          logger.warn("Registration rejected: user exists");
        }
        return createResult;
      }

      const user = createResult.value;
      const token = tokenService.generateToken(user.id, user.username);
      if (!token.ok) return token;

      logger.info("User registered", { userId: user.id });
      return ok({ token: token.value, user });
    },

    async login(cmd: LoginCommand): Promise<Result<AuthResult, AppError>> {
      const findResult = await userRepo.findByEmail(cmd.email);
      if (!findResult.ok) return findResult;

      const user = findResult.value;
      if (user === null) {
        const fallback = await decoyPassword();
        if (fallback) await fallback.verify(cmd.password, passwordHasher);
        logger.warn("Login failed");
        return err(invalidCredentials());
      }

      if (!(await user.passwordHash.verify(cmd.password, passwordHasher))) {
        logger.warn("Login failed");
        return err(invalidCredentials());
      }

      const token = tokenService.generateToken(user.id, user.username);
      if (!token.ok) return token;

      logger.info("User logged in", { userId: user.id });
      return ok({ token: token.value, user });
    },
  };
};
