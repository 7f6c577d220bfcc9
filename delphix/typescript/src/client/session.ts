/**
 * Session cookie handling for the legacy engine API.
 *
 * The engine hands out a `JSESSIONID` cookie when a session is opened and
 * expects it back on every request; the login is bound to that session.
 *
 * @module client/session
 */

import type { Headers } from 'undici';

/**
 * Holds the cookies the engine set for the current session.
 */
export class SessionManager {
  private readonly cookies = new Map<string, string>();
  private authenticated = false;

  /**
   * Record any `Set-Cookie` headers from a response.
   */
  update(headers: Headers): void {
    for (const header of headers.getSetCookie()) {
      const pair = header.split(';', 1)[0];
      const index = pair.indexOf('=');
      if (index > 0) {
        this.cookies.set(pair.slice(0, index).trim(), pair.slice(index + 1).trim());
      }
    }
  }

  /**
   * Value for the `Cookie` request header, or null before a session exists.
   */
  cookieHeader(): string | null {
    if (this.cookies.size === 0) {
      return null;
    }
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join('; ');
  }

  markAuthenticated(): void {
    this.authenticated = true;
  }

  isAuthenticated(): boolean {
    return this.authenticated;
  }

  /**
   * Forget the session; the next call must log in again.
   */
  invalidate(): void {
    this.cookies.clear();
    this.authenticated = false;
  }
}
