import { log } from '../utils/logger';
import { HarvestError, SerpRequestError, errorMessage } from './errors';
import { extractProfileMatches } from './pageExtractor';
import { HarvestState, ProfileIdentifier, SearchQuery, SerpOptions, SerpSearchClient } from './types';

export const DEFAULT_SERP_OPTIONS: Readonly<SerpOptions> = Object.freeze({
  locale: 'en-us',
  resultsLanguage: 'en',
  safeSearch: true,
  similarResultsFilter: true,
  userAgentType: 'desktop_chrome',
  parse: true,
  noFalsePositiveRewrite: true,
  limit: 100,
});

export interface RunProgress {
  run: number;
  runCount: number;
  startPage: number;
  pagesPerRun: number;
  newIdentifiers: ProfileIdentifier[];
  totalIdentifiers: number;
  elapsedMs: number;
}

export interface HarvestOptions {
  signal?: AbortSignal;
  serpOptions?: SerpOptions;
  onRunComplete?: (progress: RunProgress) => void;
}

export interface HarvestStats {
  runsCompleted: number;
  nextPage: number;
  elapsedMs: number;
}

export type HarvestResult =
  | { ok: true; identifiers: ProfileIdentifier[]; stats: HarvestStats }
  | { ok: false; error: HarvestError };

const logRunProgress = (progress: RunProgress): void => {
  log(
    'INFO',
    `run ${progress.run}/${progress.runCount} completed in ${(progress.elapsedMs / 1000).toFixed(2)} seconds`,
    { startPage: progress.startPage, newIdentifiers: progress.newIdentifiers.length, totalIdentifiers: progress.totalIdentifiers },
  );
};

const toHarvestError = (error: unknown, run: number): HarvestError => {
  if (error instanceof HarvestError) return error;
  if (error instanceof SerpRequestError) return new HarvestError(`run ${run} failed: ${error.message}`, error.kind, run, error);
  return new HarvestError(`run ${run} failed: ${errorMessage(error)}`, 'transport', run, error);
};

/**
 * One harvest over a fixed query. Owns the page cursor and the set of
 * identifiers seen so far; runs must be taken in order because each run's
 * cursor depends on the previous one.
 */
export class HarvestSession {
  private readonly harvestState: HarvestState;

  constructor(
    private readonly query: SearchQuery,
    private readonly searchApi: SerpSearchClient,
    private readonly options: HarvestOptions = {},
  ) {
    this.harvestState = { currentPage: query.startPage, runsCompleted: 0, seen: new Set() };
  }

  get state(): Readonly<HarvestState> {
    return this.harvestState;
  }

  get done(): boolean {
    return this.harvestState.runsCompleted >= this.query.runCount;
  }

  /** Issues the next run. Throws SerpRequestError or HarvestError('cancelled'). */
  async runNext(): Promise<RunProgress> {
    const run = this.harvestState.runsCompleted + 1;
    if (this.done) throw new Error(`harvest already completed ${this.query.runCount} runs`);
    if (this.options.signal?.aborted) throw new HarvestError(`harvest cancelled before run ${run}`, 'cancelled', run);

    const startedAt = Date.now();
    const startPage = this.harvestState.currentPage;
    log('INFO', `running request with query '${this.query.text}', starting page ${startPage}, run ${run}`);

    const response = await this.searchApi.search(
      {
        text: this.query.text,
        startPage,
        pagesPerRun: this.query.pagesPerRun,
        options: this.options.serpOptions ?? DEFAULT_SERP_OPTIONS,
      },
      this.options.signal,
    );
    if (!response || !Array.isArray(response.results)) {
      throw new SerpRequestError('search response has no results array', 'malformed');
    }

    const newIdentifiers: ProfileIdentifier[] = [];
    for (const page of response.results) {
      for (const match of extractProfileMatches(page)) {
        if (this.harvestState.seen.has(match.identifier)) continue;
        this.harvestState.seen.add(match.identifier);
        newIdentifiers.push(match.identifier);
        log('DEBUG', `${match.identifier}, ${match.url}`);
      }
    }

    this.harvestState.currentPage += this.query.pagesPerRun;
    this.harvestState.runsCompleted = run;

    return {
      run,
      runCount: this.query.runCount,
      startPage,
      pagesPerRun: this.query.pagesPerRun,
      newIdentifiers,
      totalIdentifiers: this.harvestState.seen.size,
      elapsedMs: Date.now() - startedAt,
    };
  }
}

export const harvest = async (
  query: SearchQuery,
  searchApi: SerpSearchClient,
  options: HarvestOptions = {},
): Promise<HarvestResult> => {
  const session = new HarvestSession(query, searchApi, options);
  const onRunComplete = options.onRunComplete ?? logRunProgress;
  const startedAt = Date.now();

  while (!session.done) {
    try {
      onRunComplete(await session.runNext());
    } catch (error) {
      const run = session.state.runsCompleted + 1;
      const harvestError = options.signal?.aborted && !(error instanceof HarvestError)
        ? new HarvestError(`harvest cancelled during run ${run}`, 'cancelled', run, error)
        : toHarvestError(error, run);
      log(harvestError.kind === 'cancelled' ? 'WARN' : 'ERROR', harvestError.message, { kind: harvestError.kind });
      return { ok: false, error: harvestError };
    }
  }

  const elapsedMs = Date.now() - startedAt;
  log('INFO', `all runs completed in ${(elapsedMs / 1000).toFixed(2)} seconds`, { identifiers: session.state.seen.size });
  return {
    ok: true,
    identifiers: [...session.state.seen],
    stats: { runsCompleted: session.state.runsCompleted, nextPage: session.state.currentPage, elapsedMs },
  };
};
