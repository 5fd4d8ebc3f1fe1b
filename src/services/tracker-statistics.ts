import { LastObservation } from '../types';

/**
 * Process start time and the last values seen by the ingestion path.
 * Written on the ingestion path, read by status reports.
 */
export class TrackerStatistics {
  readonly startedAt: number;
  private observation: LastObservation = { price: 0, recentVolume: 0, zScore: 0 };

  constructor(startedAt: number = Date.now() / 1000) {
    this.startedAt = startedAt;
  }

  recordPrice(price: number): void {
    this.observation = { ...this.observation, price };
  }

  recordMetrics(recentVolume: number, zScore: number): void {
    this.observation = { ...this.observation, recentVolume, zScore };
  }

  getLastObservation(): LastObservation {
    return { ...this.observation };
  }
}
