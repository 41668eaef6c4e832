/**
 * Typebox schemas for the scrape endpoint.
 */

import { Type, type Static } from '@sinclair/typebox';
import { CLUSTER_NAME_PATTERN } from '../types/rbd/mirror-status';

export const ScrapeQuery = Type.Object({
  cluster: Type.Optional(Type.String({ pattern: CLUSTER_NAME_PATTERN, maxLength: 128 })),
});

export type ScrapeQuery = Static<typeof ScrapeQuery>;
