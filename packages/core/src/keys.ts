import { InvalidArtifactUrlError } from './errors.js';
import type { ScraperType } from './schemas.js';

export const SCRAPERS_PREFIX = 'scrapers/';
export const METADATA_PREFIX = 'metadata/';
export const ARTIFACT_EXTENSION = '.js';
export const METADATA_EXTENSION = '.json';

const escapePattern = (value: string): string => value.replace(/[-/\\^$*+?.()|[\]{}]/g, '\\$&');

export const extractDomain = (url: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidArtifactUrlError(url, message);
  }

  if (!parsed.host) {
    throw new InvalidArtifactUrlError(url, 'URL has no host');
  }

  return parsed.host.toLowerCase();
};

export const domainToKey = (domain: string): string => domain.trim().toLowerCase().replace(/[^a-z0-9-]/g, '_');

/**
 * Storage key for one artifact. `list` and `content` halves carry a suffix so both
 * sides of a pipeline live under the same domain.
 */
export const artifactKey = (domain: string, scraperType: ScraperType = 'single'): string => {
  const base = domainToKey(domain);
  return scraperType === 'single' ? base : `${base}_${scraperType}`;
};

export const artifactPath = (key: string): string => `${SCRAPERS_PREFIX}${key}${ARTIFACT_EXTENSION}`;

export const metadataPath = (key: string): string => `${METADATA_PREFIX}${key}${METADATA_EXTENSION}`;

export const buildUrlPattern = (domain: string): string => `https?://${escapePattern(domain)}(?:[/?#]|$)`;

export const compileUrlPattern = (pattern: string): RegExp | undefined => {
  try {
    return new RegExp(`^(?:${pattern})`);
  } catch {
    return undefined;
  }
};

export const matchesUrlPattern = (pattern: string, url: string): boolean => {
  if (!pattern) {
    return false;
  }
  return compileUrlPattern(pattern)?.test(url) ?? false;
};
