export type ProfileIdentifier = string;

export interface SearchQuery {
  readonly text: string;
  readonly startPage: number;
  readonly pagesPerRun: number;
  readonly runCount: number;
}

export interface HarvestState {
  currentPage: number;
  runsCompleted: number;
  seen: Set<ProfileIdentifier>; // insertion order is discovery order
}

export interface ContactRecord {
  identifier: ProfileIdentifier;
  email?: string;
  websites: string[];
  socialHandles: Record<string, string>; // { twitter: "...", skype: "..." }
  phoneNumbers: string[];
}

export type ContactPayload = Partial<Omit<ContactRecord, 'identifier'>>;

export interface SerpOptions {
  locale: string;
  resultsLanguage: string;
  safeSearch: boolean;
  similarResultsFilter: boolean;
  userAgentType: string;
  parse: boolean;
  noFalsePositiveRewrite: boolean;
  limit: number;
}

export interface SerpSearchRequest {
  text: string;
  startPage: number;
  pagesPerRun: number;
  options: SerpOptions;
}

export interface SerpOrganicResult {
  url?: unknown;
  title?: unknown;
  pos?: unknown;
}

export interface SerpResultPage {
  content?: unknown; // parsed object, or the raw HTML string when parsing failed
  page?: number;
  url?: string;
  status_code?: number;
  parser_type?: string;
}

export interface SerpSearchResponse {
  results: SerpResultPage[];
}

export interface SerpSearchClient {
  search(request: SerpSearchRequest, signal?: AbortSignal): Promise<SerpSearchResponse>;
}

export interface ProfileClient {
  getContactInfo(identifier: ProfileIdentifier): Promise<ContactPayload | null | undefined>;
}

export interface ProfileSession extends ProfileClient {
  close(): Promise<void>;
}
