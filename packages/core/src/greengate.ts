import {
  type Clock,
  type GreenGateConfig,
  type Logger,
  type SessionRequest,
  createLogger,
  systemClock,
} from '@greengate/shared';
import { type GreenGateStore, initializeStore } from '@greengate/store';
import { ConfigManager } from './config-manager.js';
import { CarbonIntensityService } from './carbon-intensity-service.js';
import { BudgetLedger } from './budget-ledger.js';
import { EnergyMonitor } from './energy-monitor.js';
import { type AcceleratorSampler, type CpuUtilizationSampler, NvidiaSmiSampler } from './energy-samplers.js';
import { Optimizer } from './optimizer.js';
import { CarbonScheduler, createSessionRequest } from './scheduler.js';
import { type CarbonIntensityProvider, StaticTableProvider, createCarbonProvider } from './providers/index.js';

export interface GreenGateOptions {
  configPath?: string;
  /** Applied on top of the loaded configuration. */
  overrides?: Record<string, unknown>;
  provider?: CarbonIntensityProvider;
  /** An open store, e.g. over an in-memory database; otherwise one is opened when store.enabled. */
  store?: GreenGateStore;
  cpuSampler?: CpuUtilizationSampler;
  acceleratorSampler?: AcceleratorSampler;
  clock?: Clock;
  logger?: Logger;
}

/** Wires configuration, carbon data, budget, monitoring and scheduling together. */
export class GreenGate {
  readonly logger: Logger;
  readonly clock: Clock;
  readonly carbon: CarbonIntensityService;
  readonly ledger: BudgetLedger;
  readonly store?: GreenGateStore;

  constructor(readonly config: GreenGateConfig, private options: GreenGateOptions = {}) {
    this.logger = options.logger ?? createLogger('greengate', config.logging.level);
    this.clock = options.clock ?? systemClock;

    if (options.store) {
      this.store = options.store;
    } else if (config.store.enabled) {
      this.store = initializeStore(config.store.dbPath);
    }

    const provider = options.provider ?? createCarbonProvider(config.carbonApi, this.clock);
    this.carbon = new CarbonIntensityService({
      provider,
      cacheTtlMs: config.carbonApi.cacheTtlMs,
      staleTtlMs: config.carbonApi.staleTtlMs,
      fallback: new StaticTableProvider(undefined, config.carbonApi.defaultRegion, this.clock),
      clock: this.clock,
      logger: this.logger.child('carbon'),
    });

    this.ledger = new BudgetLedger({
      limitGrams: config.budget.limitGrams,
      period: config.budget.period,
      repository: this.store?.budgets,
      clock: this.clock,
      logger: this.logger.child('budget'),
    });
  }

  static async create(options: GreenGateOptions = {}): Promise<GreenGate> {
    const manager = new ConfigManager();
    await manager.load({ configPath: options.configPath });
    if (options.overrides) {
      manager.set(options.overrides);
    }
    return new GreenGate(manager.getAll(), options);
  }

  createMonitor(): EnergyMonitor {
    const monitor = this.config.monitor;
    return new EnergyMonitor({
      cpuSampler: this.options.cpuSampler,
      acceleratorSampler:
        this.options.acceleratorSampler ?? (monitor.accelerator === 'nvidia-smi' ? new NvidiaSmiSampler() : undefined),
      cpuTdpWatts: monitor.cpuTdpWatts,
      idleFraction: monitor.idleFraction,
      maxFraction: monitor.maxFraction,
      historyLimit: monitor.historyLimit,
      clock: this.clock,
      logger: this.logger.child('monitor'),
    });
  }

  createOptimizer(request: SessionRequest = this.request()): Optimizer {
    return Optimizer.fromThresholds(request.thresholds, {
      minBatchSize: this.config.optimizer.minBatchSize,
      logger: this.logger.child('optimizer'),
    });
  }

  /** A fresh scheduler; run concurrent sessions on separate schedulers. */
  createScheduler(): CarbonScheduler {
    return new CarbonScheduler({
      carbon: this.carbon,
      ledger: this.ledger,
      backoff: this.config.train.backoff,
      monitor: this.createMonitor(),
      samplingIntervalMs: this.config.monitor.samplingIntervalMs,
      budgetCheckIntervalMs: this.config.train.budgetCheckIntervalMs,
      minBatchSize: this.config.optimizer.minBatchSize,
      sessions: this.store?.sessions,
      clock: this.clock,
      logger: this.logger.child('scheduler'),
    });
  }

  request(name?: string): SessionRequest {
    return createSessionRequest(this.config, name);
  }

  close(): void {
    if (this.store && !this.options.store) {
      this.store.db.close();
    }
  }
}
