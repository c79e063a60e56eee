import axios, { AxiosInstance } from 'axios';

export const createHttpClient = (proxy?: string, timeoutMs = 25000): AxiosInstance => {
  const instance = axios.create({ timeout: timeoutMs, headers: { 'accept-language': 'en-US,en;q=0.9' } });
  if (proxy) {
    const p = new URL(proxy);
    instance.defaults.proxy = {
      protocol: p.protocol.replace(':', ''),
      host: p.hostname,
      port: Number(p.port || 80),
      auth: p.username ? { username: decodeURIComponent(p.username), password: decodeURIComponent(p.password) } : undefined,
    };
  }
  return instance;
};

export const describeHttpError = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
};
