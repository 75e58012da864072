import type { RandomOptions, Simulator } from '@qubit-lab/core';

/**
 * Options shared by every protocol runner
 */
export interface ProtocolOptions extends RandomOptions {
  /**
   * Simulator to evolve circuits with (a default one is created otherwise)
   */
  simulator?: Simulator;
}

/**
 * A shot count option, validated by each runner
 */
export interface ShotOptions {
  shots?: number;
}
