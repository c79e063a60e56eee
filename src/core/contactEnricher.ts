import { log } from '../utils/logger';
import { EnrichmentCancelledError, errorMessage } from './errors';
import { ContactPayload, ContactRecord, ProfileClient, ProfileIdentifier } from './types';

export type SkipReason = 'lookup-failed' | 'no-data';

export interface EnrichOptions {
  signal?: AbortSignal;
  onSkip?: (identifier: ProfileIdentifier, reason: SkipReason, detail?: string) => void;
}

const cleanList = (values: unknown): string[] =>
  Array.isArray(values) ? values.filter((v): v is string => typeof v === 'string' && v.trim() !== '').map((v) => v.trim()) : [];

const cleanHandles = (handles: unknown): Record<string, string> => {
  if (!handles || typeof handles !== 'object' || Array.isArray(handles)) return {};
  const out: Record<string, string> = {};
  for (const [platform, handle] of Object.entries(handles)) {
    if (typeof handle === 'string' && handle.trim()) out[platform] = handle.trim();
  }
  return out;
};

export const toContactRecord = (identifier: ProfileIdentifier, payload: ContactPayload): ContactRecord | null => {
  const email = typeof payload.email === 'string' && payload.email.trim() ? payload.email.trim() : undefined;
  const record: ContactRecord = {
    identifier,
    ...(email ? { email } : {}),
    websites: cleanList(payload.websites),
    socialHandles: cleanHandles(payload.socialHandles),
    phoneNumbers: cleanList(payload.phoneNumbers),
  };
  const empty = !record.email
    && record.websites.length === 0
    && record.phoneNumbers.length === 0
    && Object.keys(record.socialHandles).length === 0;
  return empty ? null : record;
};

const logSkip = (identifier: ProfileIdentifier, reason: SkipReason, detail?: string): void => {
  log('WARN', `skipping ${identifier}: ${reason}`, detail);
};

/**
 * Resolves each identifier to a contact record, one lookup at a time against
 * the shared session. Failed or empty lookups are skipped. An aborted
 * signal stops before the next lookup with EnrichmentCancelledError.
 */
export const enrichContacts = async (
  identifiers: Iterable<ProfileIdentifier>,
  profileApi: ProfileClient,
  options: EnrichOptions = {},
): Promise<ContactRecord[]> => {
  const onSkip = options.onSkip ?? logSkip;
  const records: ContactRecord[] = [];
  const pending = [...identifiers];

  for (const [index, identifier] of pending.entries()) {
    if (options.signal?.aborted) throw new EnrichmentCancelledError(records.length, pending.length - index);
    let payload: ContactPayload | null | undefined;
    try {
      payload = await profileApi.getContactInfo(identifier);
    } catch (error) {
      onSkip(identifier, 'lookup-failed', errorMessage(error));
      continue;
    }

    const record = payload ? toContactRecord(identifier, payload) : null;
    if (!record) {
      onSkip(identifier, 'no-data');
      continue;
    }
    records.push(record);
  }

  return records;
};
