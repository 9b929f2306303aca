import type { ExecutionVerdict, Logger, ScraperMetadata } from '@scrapeyard/core';
import type { ExecutionSandbox } from '@scrapeyard/sandbox';

import type { ArtifactResolver } from './resolver.js';
import type { ArtifactWriter } from './writer.js';

export interface ArtifactValidation {
  readonly key: string;
  readonly testUrl: string;
  readonly verdict: ExecutionVerdict;
  /** Present when the run succeeded and the validation timestamp was stored. */
  readonly metadata?: ScraperMetadata;
}

export interface ValidationDependencies {
  readonly resolver: Pick<ArtifactResolver, 'getSource'>;
  readonly writer: Pick<ArtifactWriter, 'touchValidated'>;
  readonly sandbox: Pick<ExecutionSandbox, 'execute'>;
  readonly logger: Logger;
}

/**
 * Re-runs a stored scraper in the sandbox against `testUrl`. The stored source is
 * never evaluated in this process. Resolution errors propagate; execution problems
 * come back in the verdict.
 */
export const validateArtifact = async (
  dependencies: ValidationDependencies,
  domainOrKey: string,
  testUrl: string
): Promise<ArtifactValidation> => {
  const artifact = await dependencies.resolver.getSource(domainOrKey);
  const verdict = await dependencies.sandbox.execute(artifact.source, testUrl);

  if (!verdict.success) {
    dependencies.logger.warn('Stored scraper failed validation', {
      key: artifact.key,
      testUrl,
      errorKind: verdict.errorKind
    });
    return { key: artifact.key, testUrl, verdict };
  }

  const metadata = await dependencies.writer.touchValidated(artifact.key);
  return { key: artifact.key, testUrl, verdict, metadata };
};
