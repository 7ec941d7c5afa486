/**
 * Transfer Failure Simulation
 *
 * Injects a failure inside a transfer unit, after the debit or after the
 * credit, to exercise rollback. Only enabled in test/development environments.
 */

import { config } from '../../config';
import { createServiceLogger } from '../../observability/logger';

const log = createServiceLogger('transfer-simulation');

export enum FailureStage {
  AFTER_DEBIT = 'AFTER_DEBIT',
  AFTER_CREDIT = 'AFTER_CREDIT',
}

export interface FailureSimulationConfig {
  enabled: boolean;
  stage: FailureStage;
  failureRate: number; // 0-1, share of units that should fail
  failAccountIds: Set<string>; // Units sent from these accounts fail
}

export class SimulatedFailureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulatedFailureError';
  }
}

const defaults = (): FailureSimulationConfig => ({
  enabled: false,
  stage: FailureStage.AFTER_DEBIT,
  failureRate: 0,
  failAccountIds: new Set(),
});

class TransferSimulation {
  private config: FailureSimulationConfig = defaults();

  private isSimulationAllowed(): boolean {
    return config.isTest || config.isDevelopment;
  }

  /**
   * Enable failure simulation with configuration
   */
  enable(options: Partial<Omit<FailureSimulationConfig, 'enabled'>> = {}): void {
    if (!this.isSimulationAllowed()) {
      log.warn('Failure simulation is not allowed in this environment');
      return;
    }

    this.config = {
      enabled: true,
      stage: options.stage ?? this.config.stage,
      failureRate: options.failureRate ?? this.config.failureRate,
      failAccountIds: options.failAccountIds ?? this.config.failAccountIds,
    };

    log.info(
      {
        stage: this.config.stage,
        failureRate: this.config.failureRate,
        failAccountIds: Array.from(this.config.failAccountIds),
      },
      'Failure simulation enabled'
    );
  }

  disable(): void {
    this.config.enabled = false;
    this.config.failAccountIds.clear();
  }

  getConfig(): Omit<FailureSimulationConfig, 'failAccountIds'> & { failAccountIds: string[] } {
    return {
      ...this.config,
      failAccountIds: Array.from(this.config.failAccountIds),
    };
  }

  shouldFail(stage: FailureStage, fromAccountId: string): boolean {
    if (!this.config.enabled || this.config.stage !== stage) {
      return false;
    }

    if (this.config.failAccountIds.has(fromAccountId)) {
      return true;
    }

    return this.config.failureRate > 0 && Math.random() < this.config.failureRate;
  }

  /**
   * Throws SimulatedFailureError when the unit should fail at this stage
   */
  checkpoint(stage: FailureStage, fromAccountId: string): void {
    if (!this.shouldFail(stage, fromAccountId)) {
      return;
    }

    log.warn({ stage, fromAccountId }, 'Simulating transfer failure');
    throw new SimulatedFailureError(`Simulated failure ${stage} for transfer from ${fromAccountId}`);
  }

  reset(): void {
    this.config = defaults();
  }
}

export const transferSimulation = new TransferSimulation();
