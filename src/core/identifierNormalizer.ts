import { ProfileIdentifier } from './types';

// host must open the input or follow a scheme or whitespace
const PROFILE_URL_PATTERN = /(?:^|https?:\/\/|\s)(?:www\.)?linkedin\.com\/in\/([^\s/]+)/i;
const DISALLOWED_CHARS = /[^a-zA-Z0-9_-]/g;
const IDENTIFIER_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Maps a profile URL to its canonical identifier, e.g.
 * `https://www.linkedin.com/in/jane-doe-123/` -> `jane-doe-123`.
 * Returns null for anything that is not a person profile path.
 */
export const normalizeProfileUrl = (url: string): ProfileIdentifier | null => {
  const match = PROFILE_URL_PATTERN.exec(url);
  if (!match) return null;
  const cleaned = match[1].replace(DISALLOWED_CHARS, '');
  return cleaned || null;
};

export const isProfileIdentifier = (value: unknown): value is ProfileIdentifier =>
  typeof value === 'string' && IDENTIFIER_PATTERN.test(value);

export const profileUrlFor = (identifier: ProfileIdentifier): string => `https://www.linkedin.com/in/${identifier}`;
