import { homedir } from 'os';
import { join } from 'path';

export interface AppConfig {
  serpEndpoint: string;
  serpTimeoutMs: number;
  profileBaseUrl: string;
  profileTimeoutMs: number;
  profileMinIntervalMs: number;
  proxyUrl?: string;
  credentialsFile: string;
  port: number;
  apiKey?: string;
  requestTimeoutMs: number;
}

export const DEFAULT_SERP_ENDPOINT = 'https://realtime.oxylabs.io/v1/queries';
export const DEFAULT_PROFILE_BASE_URL = 'https://www.linkedin.com';
export const defaultCredentialsFile = (): string => join(homedir(), '.profile-harvester', 'credentials.json');

const readNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || !value.trim()) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

const readString = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  serpEndpoint: readString(env.SERP_ENDPOINT) || DEFAULT_SERP_ENDPOINT,
  serpTimeoutMs: readNumber(env.SERP_TIMEOUT_MS, 180000),
  profileBaseUrl: readString(env.PROFILE_BASE_URL) || DEFAULT_PROFILE_BASE_URL,
  profileTimeoutMs: readNumber(env.PROFILE_TIMEOUT_MS, 25000),
  profileMinIntervalMs: readNumber(env.PROFILE_MIN_INTERVAL_MS, 1000),
  proxyUrl: readString(env.PROXY_URL),
  credentialsFile: readString(env.CREDENTIALS_FILE) || defaultCredentialsFile(),
  port: readNumber(env.PORT, 3000),
  apiKey: readString(env.API_KEY),
  requestTimeoutMs: readNumber(env.REQUEST_TIMEOUT_MS, 600000),
});
