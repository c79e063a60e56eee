import { profileUrlFor } from '../core/identifierNormalizer';
import { ContactRecord } from '../core/types';

const formatList = (values: string[]): string => (values.length ? values.join(', ') : '-');

const formatHandles = (handles: Record<string, string>): string => {
  const entries = Object.entries(handles);
  return entries.length ? entries.map(([platform, handle]) => `${platform}: ${handle}`).join(', ') : '-';
};

export const formatContact = (record: ContactRecord): string =>
  [
    `${record.identifier} (${profileUrlFor(record.identifier)})`,
    `  email:    ${record.email ?? '-'}`,
    `  websites: ${formatList(record.websites)}`,
    `  handles:  ${formatHandles(record.socialHandles)}`,
    `  phones:   ${formatList(record.phoneNumbers)}`,
  ].join('\n');

export const formatContactReport = (records: ContactRecord[]): string =>
  records.length ? records.map(formatContact).join('\n\n') : 'No contacts found.';

export const formatContactReportJson = (records: ContactRecord[]): string => JSON.stringify(records, null, 2);
