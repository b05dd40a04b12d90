// packages/sql-api/src/session.ts
import { readFile } from 'node:fs/promises';
import { SESSION_EXPIRED_CODE } from './native-error';

export type TokenType = 'OAUTH' | 'KEYPAIR_JWT' | 'PROGRAMMATIC_ACCESS_TOKEN';

export interface CredentialSource {
  readonly tokenType: TokenType;
  token(): Promise<string>;
  /** Called once after the backend reports an expired session. */
  renew(): Promise<string>;
}

export class StaticTokenSource implements CredentialSource {
  constructor(private readonly value: string, readonly tokenType: TokenType = 'OAUTH') {}
  async token() { return this.value; }
  async renew() { return this.value; }
}

// Token file rotated by the platform; renew re-reads it.
export class FileTokenSource implements CredentialSource {
  private cached?: string;

  constructor(private readonly file: string, readonly tokenType: TokenType = 'OAUTH') {}

  async token() {
    this.cached ??= await this.read();
    return this.cached;
  }

  async renew() {
    this.cached = await this.read();
    return this.cached;
  }

  private async read() {
    return (await readFile(this.file, 'utf-8')).trim();
  }
}

export interface HttpReply {
  status: number;
  payload: unknown;
}

export function authHeaders(source: CredentialSource, token: string): Record<string, string> {
  return {
    authorization: `Bearer ${token}`,
    'x-snowflake-authorization-token-type': source.tokenType,
  };
}

export function isSessionExpired(reply: HttpReply): boolean {
  const p = reply.payload;
  return typeof p === 'object' && p !== null && 'code' in p && String(p.code) === SESSION_EXPIRED_CODE;
}

/**
 * Attach auth to `call`; on an expired session renew once and retry once.
 * Any other outcome, including a second expiry, is returned unchanged.
 */
export async function withSessionRenewal(
  source: CredentialSource,
  call: (headers: Record<string, string>) => Promise<HttpReply>,
  onRenew?: () => void
): Promise<HttpReply> {
  const first = await call(authHeaders(source, await source.token()));
  if (!isSessionExpired(first)) return first;
  onRenew?.();
  const renewed = await source.renew();
  return call(authHeaders(source, renewed));
}
