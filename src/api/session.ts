/**
 * Cookie store for the Tunnelflight web session.
 * The site tracks a logged-in member through the cookies it sets on the
 * main page and on login, so every request replays them.
 */
import type { AxiosInstance, AxiosResponseHeaders, RawAxiosResponseHeaders } from 'axios';

export class SessionCookies {
  private readonly cookies: Map<string, string> = new Map();

  /**
   * Record the cookies from a response's Set-Cookie headers.
   * Expired or emptied cookies are dropped.
   */
  public store(headers: RawAxiosResponseHeaders | AxiosResponseHeaders | undefined): void {
    const setCookie: unknown = headers?.['set-cookie'];
    const lines = Array.isArray(setCookie) ? setCookie : typeof setCookie === 'string' ? [setCookie] : [];

    for (const line of lines) {
      if (typeof line !== 'string') {
        continue;
      }

      const [pair, ...attributes] = line.split(';');
      const separator = pair.indexOf('=');
      if (separator <= 0) {
        continue;
      }

      const name = pair.slice(0, separator).trim();
      const value = pair.slice(separator + 1).trim();
      const expired = attributes.some(attribute => {
        const [key, attributeValue = ''] = attribute.trim().split('=');
        if (key.toLowerCase() === 'max-age') {
          return Number(attributeValue) <= 0;
        }
        if (key.toLowerCase() === 'expires') {
          const expires = Date.parse(attributeValue);
          return !Number.isNaN(expires) && expires <= Date.now();
        }
        return false;
      });

      if (expired || value === '') {
        this.cookies.delete(name);
      } else {
        this.cookies.set(name, value);
      }
    }
  }

  /**
   * Value for a Cookie request header, or undefined with no cookies
   */
  public header(): string | undefined {
    if (this.cookies.size === 0) {
      return undefined;
    }
    return Array.from(this.cookies.entries())
      .map(([name, value]) => `${name}=${value}`)
      .join('; ');
  }

  public get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  public clear(): void {
    this.cookies.clear();
  }

  public get size(): number {
    return this.cookies.size;
  }

  /**
   * Install interceptors that send and collect cookies on an axios instance
   */
  public attach(http: AxiosInstance): void {
    http.interceptors.request.use(config => {
      const cookieHeader = this.header();
      if (cookieHeader) {
        config.headers.set('Cookie', cookieHeader);
      }
      return config;
    });

    http.interceptors.response.use(response => {
      this.store(response.headers);
      return response;
    });
  }
}
