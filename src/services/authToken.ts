import { randomUUID } from 'crypto';

export interface AuthToken {
  token: string;
  uuid: string;
}

/**
 * Source of the anti-bot authorization header. Asked once, when a client is
 * created without a pre-supplied token.
 */
export interface AuthTokenProvider {
  generate(proxy: string, verify: boolean): Promise<AuthToken>;
}

export class StaticTokenProvider implements AuthTokenProvider {
  private readonly authToken: AuthToken;

  constructor(token: string, uuid: string = randomUUID()) {
    this.authToken = { token, uuid };
  }

  async generate(): Promise<AuthToken> {
    return this.authToken;
  }
}
