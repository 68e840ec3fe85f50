/**
 * Scanline — Fetch Sources
 *
 * Builds the enabled sources from configuration and environment.
 * X needs a bearer token; without one it is skipped with a warning.
 */

import type { ContentSource, PipelineConfig } from '../../types';
import type { FetchSource, SourceOptions } from '../base';
import { logger } from '../../lib/logger';
import { RedditSearchSource } from './reddit-search';
import { WebSearchSource } from './web-search';
import { XSearchSource } from './x-search';

export { RedditSearchSource } from './reddit-search';
export { WebSearchSource } from './web-search';
export { XSearchSource, tweetTitle, type XSearchOptions } from './x-search';

export type SourceSet = Partial<Record<ContentSource, FetchSource>>;

export function createSources(
  config: PipelineConfig,
  env: NodeJS.ProcessEnv = process.env
): SourceSet {
  const options: SourceOptions = { lookbackDays: config.run.lookbackDays };
  const sources: SourceSet = {};

  for (const name of config.run.sources) {
    switch (name) {
      case 'reddit':
        sources.reddit = new RedditSearchSource(options);
        break;
      case 'web':
        sources.web = new WebSearchSource(options);
        break;
      case 'x': {
        const bearerToken = env.X_BEARER_TOKEN;
        if (!bearerToken) {
          logger.warn('X source disabled: X_BEARER_TOKEN is not set');
          break;
        }
        sources.x = new XSearchSource({ ...options, bearerToken });
        break;
      }
    }
  }

  return sources;
}
