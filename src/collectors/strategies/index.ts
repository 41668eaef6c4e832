import type { StatusShape } from '../../types/rbd/mirror-status';
import { modeListStrategy } from './mode-list';
import { peerDescriptionStrategy } from './peer-description';
import type { StatusShapeStrategy } from './types';

export { modeListStrategy, imageStatusArgs } from './mode-list';
export { peerDescriptionStrategy, parseLastUpdate, extractStatsFragment, isReplaying } from './peer-description';
export type { StatusShapeStrategy, StrategyContext } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

/**
 * `auto` looks at the pool payload: any image carrying `peer_sites` means the verbose
 * peer-description output, otherwise the mode list.
 */
export function detectShape(payload: unknown): Exclude<StatusShape, 'auto'> {
  if (!isRecord(payload) || !Array.isArray(payload.images)) return 'mode-list';
  const images: unknown[] = payload.images;
  return images.some((image) => isRecord(image) && 'peer_sites' in image) ? 'peer-description' : 'mode-list';
}

export function selectStrategy(shape: StatusShape, payload: unknown): StatusShapeStrategy {
  const resolved = shape === 'auto' ? detectShape(payload) : shape;
  return resolved === 'peer-description' ? peerDescriptionStrategy : modeListStrategy;
}
