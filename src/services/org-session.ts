/**
 * Session provider backed by an authenticated org from the sf CLI
 * keychain. The CLI owns the credentials; this only hands out the
 * connection and asks the org to refresh its token.
 */

import type { Connection, Org } from '@salesforce/core';
import { AuthError, toError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { SessionProvider } from '../core/types.js';

const log = createLogger('org-session');

export class OrgSessionProvider implements SessionProvider<Connection> {
  constructor(
    private readonly org: Org,
    private readonly apiVersion: string
  ) {}

  async acquire(): Promise<Connection> {
    return this.org.getConnection(this.apiVersion);
  }

  async isValid(): Promise<boolean> {
    try {
      const conn = await this.acquire();
      await conn.identity();
      return true;
    } catch (err) {
      log.debug({ err }, 'Session check failed');
      return false;
    }
  }

  async reauthenticate(): Promise<void> {
    const username = this.org.getUsername();
    log.info({ username }, 'Refreshing org session');
    try {
      await this.org.refreshAuth();
    } catch (error) {
      const err = toError(error);
      throw new AuthError(
        `Could not refresh the session for ${username ?? 'the target org'}: ${err.message}`,
        username,
        err
      );
    }
  }
}
