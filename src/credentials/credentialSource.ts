import { promises as fs } from 'fs';
import { dirname } from 'path';
import { log } from '../utils/logger';

export interface AccountCredentials {
  username: string;
  password: string;
}

export interface Credentials {
  serp: AccountCredentials;
  profile: AccountCredentials;
}

export type CredentialKey = 'serpUsername' | 'serpPassword' | 'profileUsername' | 'profilePassword';

export type PartialCredentials = Partial<Record<CredentialKey, string>>;

export interface CredentialSource {
  resolve(): Promise<Credentials>;
}

export interface Prompter {
  ask(key: CredentialKey, message: string, secret: boolean): Promise<string>;
}

export const CREDENTIAL_KEYS: readonly CredentialKey[] = ['serpUsername', 'serpPassword', 'profileUsername', 'profilePassword'];

const PROMPTS: Record<CredentialKey, string> = {
  serpUsername: 'Enter Oxylabs username:',
  serpPassword: 'Enter Oxylabs password:',
  profileUsername: 'Enter LinkedIn username:',
  profilePassword: 'Enter LinkedIn password:',
};

const ENV_NAMES: Record<CredentialKey, string> = {
  serpUsername: 'OXYLABS_USERNAME',
  serpPassword: 'OXYLABS_PASSWORD',
  profileUsername: 'LINKEDIN_USERNAME',
  profilePassword: 'LINKEDIN_PASSWORD',
};

const isSecret = (key: CredentialKey): boolean => key.endsWith('Password');

const pickStrings = (source: Record<string, unknown>): PartialCredentials => {
  const picked: PartialCredentials = {};
  for (const key of CREDENTIAL_KEYS) {
    const value = source[key];
    if (typeof value === 'string' && value.trim()) picked[key] = value.trim();
  }
  return picked;
};

export const credentialsFromEnv = (env: NodeJS.ProcessEnv = process.env): PartialCredentials => {
  const picked: PartialCredentials = {};
  for (const key of CREDENTIAL_KEYS) {
    const value = env[ENV_NAMES[key]]?.trim();
    if (value) picked[key] = value;
  }
  return picked;
};

export const readCredentialFile = async (path: string): Promise<PartialCredentials> => {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return {};
    throw error;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      log('WARN', `ignoring credential file ${path}: expected a JSON object`);
      return {};
    }
    return pickStrings(parsed as Record<string, unknown>);
  } catch (error) {
    log('WARN', `ignoring unreadable credential file ${path}`, (error as Error).message);
    return {};
  }
};

export const writeCredentialFile = async (path: string, values: PartialCredentials): Promise<void> => {
  const existing = await readCredentialFile(path);
  await fs.mkdir(dirname(path), { recursive: true, mode: 0o700 });
  await fs.writeFile(path, `${JSON.stringify({ ...existing, ...values }, null, 2)}\n`, { mode: 0o600 });
  await fs.chmod(path, 0o600);
};

export interface ChainedCredentialSourceOptions {
  flags?: PartialCredentials;
  env?: NodeJS.ProcessEnv;
  filePath?: string;
  prompter?: Prompter;
  persist?: boolean;
}

/**
 * Fills each secret from flags, then environment, then the credential file,
 * then the prompter. Prompted values are written back to the file when
 * `persist` is set.
 */
export class ChainedCredentialSource implements CredentialSource {
  constructor(private readonly options: ChainedCredentialSourceOptions = {}) {}

  async resolve(): Promise<Credentials> {
    const { flags = {}, env = process.env, filePath, prompter, persist = false } = this.options;
    const fromFile = filePath ? await readCredentialFile(filePath) : {};
    const merged: PartialCredentials = { ...fromFile, ...credentialsFromEnv(env), ...pickStrings(flags) };

    const prompted: PartialCredentials = {};
    for (const key of CREDENTIAL_KEYS) {
      if (merged[key]) continue;
      if (!prompter) throw new Error(`missing credential ${ENV_NAMES[key]}`);
      const answer = (await prompter.ask(key, PROMPTS[key], isSecret(key))).trim();
      if (!answer) throw new Error(`missing credential ${ENV_NAMES[key]}`);
      merged[key] = answer;
      prompted[key] = answer;
    }

    if (persist && filePath && Object.keys(prompted).length > 0) {
      await writeCredentialFile(filePath, prompted);
      log('INFO', `saved credentials to ${filePath}`);
    }

    const take = (key: CredentialKey): string => {
      const value = merged[key];
      if (!value) throw new Error(`missing credential ${ENV_NAMES[key]}`);
      return value;
    };
    return {
      serp: { username: take('serpUsername'), password: take('serpPassword') },
      profile: { username: take('profileUsername'), password: take('profilePassword') },
    };
  }
}
