import { SearchQuery } from './types';

export class QueryValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QueryValidationError';
  }
}

export interface RawSearchQuery {
  text?: unknown;
  startPage?: unknown;
  pagesPerRun?: unknown;
  runCount?: unknown;
}

const validatePositiveInteger = (value: unknown, key: string): number => {
  if (value === undefined || value === null || value === '') return 1;
  const parsed = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 1) {
    throw new QueryValidationError(`${key} must be a positive integer`);
  }
  return parsed;
};

const validateText = (value: unknown): string => {
  if (typeof value !== 'string' || !value.trim()) {
    throw new QueryValidationError('query must be a non-empty string');
  }
  return value.trim();
};

export const normalizeSearchQuery = (raw: RawSearchQuery): SearchQuery =>
  Object.freeze({
    text: validateText(raw.text),
    startPage: validatePositiveInteger(raw.startPage, 'startPage'),
    pagesPerRun: validatePositiveInteger(raw.pagesPerRun, 'pagesPerRun'),
    runCount: validatePositiveInteger(raw.runCount, 'runCount'),
  });
