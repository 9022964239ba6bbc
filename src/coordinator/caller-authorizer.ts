import { UnauthorizedCallerError } from '../types/errors';
import { logger } from '../utils/logger';

export interface CallerAuthorizer {
  isAuthorized(callerIdentity: string): boolean;
}

/**
 * Allow-list of relay / VM identities permitted to deliver callbacks. Only the admin identity
 * may change the list.
 */
export class AllowListAuthorizer implements CallerAuthorizer {
  private allowed: Set<string>;
  private admin: string;

  constructor(adminIdentity: string, initial: string[] = []) {
    this.admin = adminIdentity.toLowerCase();
    this.allowed = new Set(initial.map(identity => identity.toLowerCase()));
  }

  isAuthorized(callerIdentity: string): boolean {
    return this.allowed.has(callerIdentity.toLowerCase());
  }

  authorize(adminIdentity: string, callerIdentity: string, allowed: boolean): void {
    if (!this.admin || adminIdentity.toLowerCase() !== this.admin) {
      logger.warn('Rejected allow-list change from non-admin', { caller: adminIdentity, target: callerIdentity });
      throw new UnauthorizedCallerError(adminIdentity, 'manage the allow-list');
    }

    const identity = callerIdentity.toLowerCase();
    if (allowed) {
      this.allowed.add(identity);
    } else {
      this.allowed.delete(identity);
    }
    logger.info(`Caller ${identity} ${allowed ? 'authorized' : 'revoked'}`);
  }

  list(): string[] {
    return Array.from(this.allowed).sort();
  }
}

/**
 * Throws UnauthorizedCallerError (and logs it as a potential attack) unless the caller is allowed.
 */
export function requireAuthorized(authorizer: CallerAuthorizer, callerIdentity: string, action: string): void {
  if (!authorizer.isAuthorized(callerIdentity)) {
    logger.warn(`⚠️ Unauthorized caller rejected`, { caller: callerIdentity, action });
    throw new UnauthorizedCallerError(callerIdentity, action);
  }
}
