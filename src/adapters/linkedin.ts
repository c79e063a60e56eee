import { AxiosInstance, AxiosResponse } from 'axios';
import { ProfileLoginError } from '../core/errors';
import { ContactPayload, ProfileIdentifier, ProfileSession } from '../core/types';
import { DEFAULT_PROFILE_BASE_URL } from '../utils/config';
import { createHttpClient, describeHttpError } from '../utils/httpClient';
import { log } from '../utils/logger';
import { Clock, RateLimiter } from '../utils/rateLimiter';

export interface LinkedInCredentials {
  username: string;
  password: string;
}

export interface LinkedInClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  proxy?: string;
  minIntervalMs?: number;
  clock?: Clock;
  http?: AxiosInstance;
}

const AUTH_HEADERS: Record<string, string> = {
  'x-li-user-agent': 'LIAuthLibrary:0.0.3 com.linkedin.android:4.1.881 Asus_ASUS_Z01QD:android_9',
  'user-agent': 'ANDROID OS',
  'x-user-language': 'en',
  'x-user-locale': 'en_US',
  'accept-language': 'en-us',
};

const VOYAGER_HEADERS: Record<string, string> = {
  'user-agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'accept-language': 'en-US,en;q=0.9',
  'x-li-lang': 'en_US',
  'x-restli-protocol-version': '2.0.0',
};

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord => !!value && typeof value === 'object' && !Array.isArray(value);

const readString = (value: unknown): string | undefined => (typeof value === 'string' && value.trim() ? value.trim() : undefined);

const readField = (items: unknown, field: string): string[] =>
  Array.isArray(items)
    ? items.map((item) => (isRecord(item) ? readString(item[field]) : undefined)).filter((v): v is string => v !== undefined)
    : [];

/** Maps a Voyager profileContactInfo body onto a contact payload. */
export const parseContactInfo = (data: unknown): ContactPayload | null => {
  if (!isRecord(data)) return null;

  const socialHandles: Record<string, string> = {};
  const [twitter] = readField(data.twitterHandles, 'name');
  if (twitter) socialHandles.twitter = twitter;
  if (Array.isArray(data.ims)) {
    for (const im of data.ims) {
      if (!isRecord(im)) continue;
      const provider = readString(im.provider);
      const id = readString(im.id);
      if (provider && id) socialHandles[provider.toLowerCase()] = id;
    }
  }

  return {
    email: readString(data.emailAddress),
    websites: readField(data.websites, 'url'),
    socialHandles,
    phoneNumbers: readField(data.phoneNumbers, 'number'),
  };
};

export class CookieJar {
  private readonly cookies = new Map<string, string>();

  store(setCookie: unknown): void {
    const lines = Array.isArray(setCookie) ? setCookie : [setCookie];
    for (const line of lines) {
      if (typeof line !== 'string') continue;
      const [pair] = line.split(';');
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      this.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
  }

  get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  header(): string {
    return [...this.cookies.entries()].map(([name, value]) => `${name}=${value}`).join('; ');
  }

  clear(): void {
    this.cookies.clear();
  }
}

const readLoginResult = (data: unknown): string | undefined => {
  if (isRecord(data)) return readString(data.login_result);
  if (typeof data === 'string') {
    try {
      const parsed: unknown = JSON.parse(data);
      return isRecord(parsed) ? readString(parsed.login_result) : undefined;
    } catch {
      return undefined;
    }
  }
  return undefined;
};

export class LinkedInProfileClient implements ProfileSession {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly limiter: RateLimiter;
  private readonly jar = new CookieJar();
  private csrfToken: string | null = null;

  private constructor(options: LinkedInClientOptions) {
    this.baseUrl = (options.baseUrl || DEFAULT_PROFILE_BASE_URL).replace(/\/+$/, '');
    this.http = options.http ?? createHttpClient(options.proxy, options.timeoutMs ?? 25000);
    this.limiter = new RateLimiter(options.minIntervalMs ?? 1000, options.clock);
  }

  static async login(credentials: LinkedInCredentials, options: LinkedInClientOptions = {}): Promise<LinkedInProfileClient> {
    const client = new LinkedInProfileClient(options);
    await client.authenticate(credentials);
    log('INFO', 'authenticated with profile api', { username: credentials.username });
    return client;
  }

  private async send(request: () => Promise<AxiosResponse<unknown>>): Promise<AxiosResponse<unknown>> {
    try {
      return await request();
    } catch (error) {
      throw new ProfileLoginError(`unable to reach profile api: ${describeHttpError(error)}`);
    }
  }

  private async authenticate(credentials: LinkedInCredentials): Promise<void> {
    const authUrl = `${this.baseUrl}/uas/authenticate`;
    const seed = await this.send(() => this.http.get<unknown>(authUrl, { headers: AUTH_HEADERS, validateStatus: () => true }));
    this.jar.store(seed.headers['set-cookie']);

    const sessionId = this.jar.get('JSESSIONID');
    if (!sessionId) throw new ProfileLoginError('profile api did not issue a session cookie', seed.status);

    const form = new URLSearchParams({
      session_key: credentials.username,
      session_password: credentials.password,
      JSESSIONID: sessionId,
    });
    const res = await this.send(() => this.http.post<unknown>(authUrl, form.toString(), {
      headers: { ...AUTH_HEADERS, 'content-type': 'application/x-www-form-urlencoded', cookie: this.jar.header() },
      validateStatus: () => true,
    }));

    if (res.status === 401) throw new ProfileLoginError('profile api rejected the credentials', res.status);
    if (res.status < 200 || res.status >= 300) throw new ProfileLoginError(`profile api login failed with status ${res.status}`, res.status);

    const result = readLoginResult(res.data);
    if (result !== 'PASS') throw new ProfileLoginError(`profile api login did not pass: ${result ?? 'no login result'}`, res.status);

    this.jar.store(res.headers['set-cookie']);
    this.csrfToken = (this.jar.get('JSESSIONID') || sessionId).replace(/"/g, '');
  }

  async getContactInfo(identifier: ProfileIdentifier): Promise<ContactPayload | null> {
    if (!this.csrfToken) throw new Error('profile session is closed');
    await this.limiter.wait();

    const url = `${this.baseUrl}/voyager/api/identity/profiles/${encodeURIComponent(identifier)}/profileContactInfo`;
    const res = await this.http.get<unknown>(url, {
      headers: { ...VOYAGER_HEADERS, cookie: this.jar.header(), 'csrf-token': this.csrfToken },
      validateStatus: () => true,
    });

    if (res.status < 200 || res.status >= 300) {
      log('DEBUG', `contact lookup for ${identifier} returned status ${res.status}`);
      return null;
    }
    return parseContactInfo(res.data);
  }

  async close(): Promise<void> {
    this.csrfToken = null;
    this.jar.clear();
    this.limiter.reset();
  }
}
