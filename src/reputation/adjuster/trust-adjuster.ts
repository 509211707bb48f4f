import { clampScore } from '../scoring/score.utils';

/**
 * Resources whose trust the incremental model moves.
 */
export const RESOURCE_CLASSES = ['ip', 'rdns', 'helo', 'mailFrom', 'mailFromDomain', 'recipient'] as const;

export type ResourceClass = (typeof RESOURCE_CLASSES)[number];

export const BASE_PENALTY = 0.1;

/** Half the penalty: trust is lost faster than it is rebuilt */
export const BASE_REWARD = 0.05;

/**
 * How strongly a signal moves each resource's trust.
 */
export const DEGRADATION_FACTORS: Readonly<Record<ResourceClass, number>> = {
  ip: 1.0,
  rdns: 0.8,
  helo: 0.6,
  mailFrom: 0.4,
  mailFromDomain: 0.2,
  recipient: 0.5,
};

/**
 * Weights of the per-resource trusts in a session's overall trust.
 */
export const BLEND_WEIGHTS = {
  ip: 0.5,
  rdns: 0.3,
  helo: 0.2,
} as const;

export type BlendedResource = keyof typeof BLEND_WEIGHTS;

export function penalize(resourceClass: ResourceClass, current: number): number {
  return clampScore(current - BASE_PENALTY * DEGRADATION_FACTORS[resourceClass]);
}

export function reward(resourceClass: ResourceClass, current: number): number {
  return clampScore(current + BASE_REWARD * DEGRADATION_FACTORS[resourceClass]);
}

/**
 * Rewards when `outcome` holds, penalizes otherwise.
 */
export function adjust(resourceClass: ResourceClass, current: number, outcome: boolean): number {
  return outcome ? reward(resourceClass, current) : penalize(resourceClass, current);
}

/**
 * Folds a session's final overall trust into one resource's stored trust.
 */
export function blendFeedback(resource: BlendedResource, current: number, overall: number): number {
  return clampScore((current + overall * BLEND_WEIGHTS[resource]) / 2);
}
