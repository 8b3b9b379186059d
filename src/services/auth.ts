/**
 * AuthService: registration, login and the current-user lookup.
 *
 * Password hashes never leave this service or the user directory. Login
 * failures share one error whether the email or the password was wrong.
 */

import type { AuthResponse, Identity, UserProfile } from "../types";
import type { UserDirectory } from "../storage/users";
import type { CredentialStore } from "../auth/credentials";
import type { TokenCodec } from "../auth/jwt";
import { DuplicateCredentialError, InvalidCredentialError, NotFoundError } from "../api/errors";
import { ctxLogger } from "../api/request-context";

export interface RegisterCommand {
  email: string;
  password: string;
  displayName?: string;
}

export interface LoginCommand {
  email: string;
  password: string;
}

/** Hashed once, compared against when the email is unknown */
const UNKNOWN_ACCOUNT_SECRET = "unknown-account-placeholder";

export class AuthService {
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly users: UserDirectory,
    private readonly credentials: CredentialStore,
    private readonly codec: TokenCodec
  ) {}

  /**
   * @throws DuplicateCredentialError if the email is already registered
   */
  async register(command: RegisterCommand): Promise<AuthResponse> {
    if (await this.users.existsByEmail(command.email)) {
      throw new DuplicateCredentialError();
    }

    const credentialHash = await this.credentials.hash(command.password);

    // The unique index still rejects a concurrent registration that got this far
    const user = await this.users.create({
      email: command.email,
      credentialHash,
      displayName: command.displayName || null,
    });

    ctxLogger.info("User registered", { userId: user.id });
    return this.issueFor(user);
  }

  /**
   * @throws InvalidCredentialError on unknown email or wrong password
   */
  async login(command: LoginCommand): Promise<AuthResponse> {
    const account = await this.users.findCredentials(command.email);

    if (!account) {
      // Same bcrypt cost as a real comparison, so timing does not reveal the email is unknown
      await this.credentials.verify(command.password, await this.getDummyHash());
      throw new InvalidCredentialError();
    }

    const valid = await this.credentials.verify(command.password, account.credentialHash);
    if (!valid) {
      ctxLogger.info("Login rejected", { userId: account.userId });
      throw new InvalidCredentialError();
    }

    const user = await this.users.findById(account.userId);
    if (!user) {
      throw new InvalidCredentialError();
    }

    ctxLogger.info("User logged in", { userId: user.id });
    return this.issueFor(user);
  }

  /**
   * Re-reads the account so a deleted user is reported as NotFound.
   * The response carries no token.
   */
  async currentUser(identity: Identity): Promise<AuthResponse> {
    const user = await this.users.findById(identity.userId);
    if (!user) {
      throw new NotFoundError("User", identity.userId);
    }
    return toAuthResponse(user);
  }

  private async issueFor(user: UserProfile): Promise<AuthResponse> {
    const token = await this.codec.issue({ userId: user.id, email: user.email });
    return { token, tokenType: "Bearer", ...toAuthResponse(user) };
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= this.credentials.hash(UNKNOWN_ACCOUNT_SECRET);
    return this.dummyHash;
  }
}

function toAuthResponse(user: UserProfile): AuthResponse {
  return {
    userId: user.id,
    email: user.email,
    displayName: user.displayName,
  };
}
