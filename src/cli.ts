#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import inquirer from 'inquirer';
import { LinkedInProfileClient } from './adapters/linkedin';
import { OxylabsSerpClient } from './adapters/oxylabs';
import { errorMessage, SerpRequestError } from './core/errors';
import { runPipeline } from './core/pipeline';
import { normalizeSearchQuery, QueryValidationError } from './core/queryNormalizer';
import { SearchQuery } from './core/types';
import { ChainedCredentialSource, CredentialKey, Credentials, Prompter } from './credentials/credentialSource';
import { formatContactReport, formatContactReportJson } from './report/contactReport';
import { AppConfig, loadConfig } from './utils/config';
import { log } from './utils/logger';

const EXAMPLE_TEXT = `
example:
  profile-harvester --serp-user USER --serp-password PASS --profile-user USER --profile-password PASS \\
    --runs 3 --pages 5 --start-page 1 --query "site:linkedin.com software engineer"`;

export interface CliOptions {
  serpUser?: string;
  serpPassword?: string;
  profileUser?: string;
  profilePassword?: string;
  runs: string;
  pages: string;
  startPage: string;
  query?: string;
  credentialsFile?: string;
  saveCredentials: boolean;
  json: boolean;
}

class InquirerPrompter implements Prompter {
  async ask(_key: CredentialKey, message: string, secret: boolean): Promise<string> {
    const question = secret
      ? { type: 'password' as const, name: 'value', message, mask: '*' }
      : { type: 'input' as const, name: 'value', message };
    const answers = await inquirer.prompt<{ value: string }>([question]);
    return answers.value;
  }
}

const askQuery = async (): Promise<string> => {
  const answers = await inquirer.prompt<{ query: string }>([{ type: 'input', name: 'query', message: 'Enter search query:' }]);
  return answers.query;
};

export interface CliDeps {
  config?: AppConfig;
  env?: NodeJS.ProcessEnv;
  prompter?: Prompter;
  askQuery?: () => Promise<string>;
  pipeline?: typeof runPipeline;
  print?: (text: string) => void;
}

/** Resolves with the process exit code: 0 on success, 1 on any failure. */
export const run = async (opts: CliOptions, deps: CliDeps = {}): Promise<number> => {
  const config = deps.config ?? loadConfig();
  const print = deps.print ?? ((text: string) => console.log(text));

  let query: SearchQuery;
  try {
    query = normalizeSearchQuery({
      text: opts.query ?? (await (deps.askQuery ?? askQuery)()),
      startPage: opts.startPage,
      pagesPerRun: opts.pages,
      runCount: opts.runs,
    });
  } catch (error) {
    if (!(error instanceof QueryValidationError)) throw error;
    log('ERROR', error.message);
    return 1;
  }

  let credentials: Credentials;
  try {
    credentials = await new ChainedCredentialSource({
      flags: {
        serpUsername: opts.serpUser,
        serpPassword: opts.serpPassword,
        profileUsername: opts.profileUser,
        profilePassword: opts.profilePassword,
      },
      env: deps.env,
      filePath: opts.credentialsFile || config.credentialsFile,
      prompter: deps.prompter ?? new InquirerPrompter(),
      persist: opts.saveCredentials,
    }).resolve();
  } catch (error) {
    log('ERROR', 'unable to resolve credentials', errorMessage(error));
    return 1;
  }

  const searchApi = new OxylabsSerpClient(credentials.serp, {
    endpoint: config.serpEndpoint,
    timeoutMs: config.serpTimeoutMs,
    proxy: config.proxyUrl,
  });

  const result = await (deps.pipeline ?? runPipeline)(query, {
    searchApi,
    openProfileSession: () => LinkedInProfileClient.login(credentials.profile, {
      baseUrl: config.profileBaseUrl,
      timeoutMs: config.profileTimeoutMs,
      minIntervalMs: config.profileMinIntervalMs,
      proxy: config.proxyUrl,
    }),
  });

  if (!result.ok) {
    if (result.stage === 'harvest' && result.error.cause instanceof SerpRequestError && result.error.cause.body) {
      log('ERROR', 'bad response received', result.error.cause.body);
    }
    return 1;
  }

  print(opts.json ? formatContactReportJson(result.contacts) : formatContactReport(result.contacts));
  return 0;
};

export const handleInterrupt = (
  exit: (code: number) => void = (code) => process.exit(code),
  print: (text: string) => void = (text) => console.log(text),
): void => {
  print('\nCaught SIGINT, ending search.');
  exit(0);
};

export const buildProgram = (
  deps: CliDeps = {},
  setExitCode: (code: number) => void = (code) => {
    process.exitCode = code;
  },
): Command =>
  new Command()
    .name('profile-harvester')
    .description('Finds LinkedIn profiles through the Oxylabs SERP API and collects their contact info')
    .option('--serp-user <username>', 'Oxylabs username')
    .option('--serp-password <password>', 'Oxylabs password')
    .option('--profile-user <username>', 'LinkedIn username')
    .option('--profile-password <password>', 'LinkedIn password')
    .option('--runs <count>', 'number of runs', '1')
    .option('--pages <count>', 'number of pages per run', '1')
    .option('--start-page <page>', 'starting page', '1')
    .option('--query <text>', 'search query')
    .option('--credentials-file <path>', 'credential file to read, and to write with --save-credentials')
    .option('--save-credentials', 'store prompted credentials in the credential file', false)
    .option('--json', 'print contacts as JSON', false)
    .addHelpText('after', EXAMPLE_TEXT)
    .action(async (opts: CliOptions) => {
      setExitCode(await run(opts, deps));
    });

if (require.main === module) {
  process.on('SIGINT', () => handleInterrupt());

  buildProgram()
    .parseAsync(process.argv)
    .then(() => process.exit(process.exitCode ?? 0))
    .catch((error) => {
      log('ERROR', 'profile-harvester failed', errorMessage(error));
      process.exit(1);
    });
}
