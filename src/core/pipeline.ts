import { log } from '../utils/logger';
import { enrichContacts, EnrichOptions } from './contactEnricher';
import { EnrichmentCancelledError, HarvestError, errorMessage } from './errors';
import { harvest, HarvestOptions } from './harvester';
import { ContactRecord, ProfileIdentifier, ProfileSession, SearchQuery, SerpSearchClient } from './types';

export interface PipelineDeps {
  searchApi: SerpSearchClient;
  openProfileSession: () => Promise<ProfileSession>;
  harvestOptions?: HarvestOptions;
  enrichOptions?: EnrichOptions;
}

export type PipelineResult =
  | { ok: true; identifiers: ProfileIdentifier[]; contacts: ContactRecord[]; elapsedMs: number }
  | { ok: false; stage: 'login'; error: Error }
  | { ok: false; stage: 'harvest'; error: HarvestError }
  | { ok: false; stage: 'enrich'; error: EnrichmentCancelledError };

const closeSession = async (session: ProfileSession): Promise<void> => {
  try {
    await session.close();
  } catch (error) {
    log('WARN', 'profile session close failed', errorMessage(error));
  }
};

export const runPipeline = async (query: SearchQuery, deps: PipelineDeps): Promise<PipelineResult> => {
  const started = Date.now();

  let session: ProfileSession;
  try {
    session = await deps.openProfileSession();
  } catch (error) {
    log('ERROR', 'unable to connect or authenticate with the profile api', errorMessage(error));
    return { ok: false, stage: 'login', error: error instanceof Error ? error : new Error(String(error)) };
  }

  try {
    const harvested = await harvest(query, deps.searchApi, deps.harvestOptions);
    if (!harvested.ok) return { ok: false, stage: 'harvest', error: harvested.error };

    let contacts: ContactRecord[];
    try {
      contacts = await enrichContacts(harvested.identifiers, session, deps.enrichOptions);
    } catch (error) {
      if (!(error instanceof EnrichmentCancelledError)) throw error;
      log('WARN', error.message, { resolved: error.resolved });
      return { ok: false, stage: 'enrich', error };
    }
    log('INFO', `resolved ${contacts.length} of ${harvested.identifiers.length} profiles`);
    return { ok: true, identifiers: harvested.identifiers, contacts, elapsedMs: Date.now() - started };
  } finally {
    await closeSession(session);
  }
};
