import 'dotenv/config';
import express, { Express, Request, Response } from 'express';
import { LinkedInProfileClient } from './adapters/linkedin';
import { OxylabsSerpClient } from './adapters/oxylabs';
import { errorMessage } from './core/errors';
import { runPipeline } from './core/pipeline';
import { normalizeSearchQuery, QueryValidationError, RawSearchQuery } from './core/queryNormalizer';
import { credentialsFromEnv } from './credentials/credentialSource';
import { AppConfig, loadConfig } from './utils/config';
import { log } from './utils/logger';

interface HarvestRequestBody extends RawSearchQuery {
  query?: unknown;
}

export interface ServerDeps {
  config: AppConfig;
  env?: NodeJS.ProcessEnv;
  pipeline?: typeof runPipeline;
}

export const createApp = ({ config, env = process.env, pipeline = runPipeline }: ServerDeps): Express => {
  const app = express();
  app.use(express.json({ limit: '64kb' }));

  app.get('/health', (_, res) => res.json({ ok: true, service: 'profile-harvester' }));

  app.post('/harvest', async (req: Request, res: Response) => {
    if (!config.apiKey || req.header('x-api-key') !== config.apiKey) return res.status(401).json({ error: 'Unauthorized' });

    const started = Date.now();
    const body: HarvestRequestBody = req.body && typeof req.body === 'object' ? req.body : {};

    try {
      const query = normalizeSearchQuery({ ...body, text: body.query });

      const { serpUsername, serpPassword, profileUsername, profilePassword } = credentialsFromEnv(env);
      if (!serpUsername || !serpPassword || !profileUsername || !profilePassword) {
        return res.status(500).json({ success: false, error: 'Service credentials are not configured' });
      }

      // one deadline covers both the harvest and the enrichment
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), config.requestTimeoutMs);
      const result = await pipeline(query, {
        searchApi: new OxylabsSerpClient(
          { username: serpUsername, password: serpPassword },
          { endpoint: config.serpEndpoint, timeoutMs: config.serpTimeoutMs, proxy: config.proxyUrl },
        ),
        openProfileSession: () => LinkedInProfileClient.login(
          { username: profileUsername, password: profilePassword },
          { baseUrl: config.profileBaseUrl, timeoutMs: config.profileTimeoutMs, minIntervalMs: config.profileMinIntervalMs, proxy: config.proxyUrl },
        ),
        harvestOptions: { signal: controller.signal },
        enrichOptions: { signal: controller.signal },
      }).finally(() => clearTimeout(timer));

      if (!result.ok) {
        return res.status(502).json({ success: false, stage: result.stage, error: result.error.message });
      }

      return res.json({
        success: true,
        identifiersFound: result.identifiers.length,
        identifiers: result.identifiers,
        contactsFound: result.contacts.length,
        contacts: result.contacts,
        runtimeSeconds: Number(((Date.now() - started) / 1000).toFixed(2)),
      });
    } catch (error) {
      if (error instanceof QueryValidationError) {
        return res.status(400).json({ success: false, error: error.message });
      }
      log('ERROR', 'harvest request failed', errorMessage(error));
      return res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  return app;
};

if (require.main === module) {
  const config = loadConfig();
  const server = createApp({ config }).listen(config.port, () => log('INFO', `profile-harvester listening on ${config.port}`));

  const shutdown = (): void => {
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
