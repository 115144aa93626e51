import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { MONITOR_MODULE_OPTIONS, POLL_INTERVAL_NAME } from '../monitor.constants';
import { PollCycleService } from './poll-cycle.service';

export interface PollSchedulerOptions {
  pollIntervalMs: number;
  enablePolling: boolean;
}

@Injectable()
export class PollSchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PollSchedulerService.name);

  constructor(
    private readonly pollCycle: PollCycleService,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(MONITOR_MODULE_OPTIONS)
    private readonly options: PollSchedulerOptions,
  ) {}

  onModuleInit(): void {
    if (!this.options.enablePolling) {
      this.logger.log('Poll interval disabled by configuration');
      return;
    }

    const interval = setInterval(() => {
      this.pollCycle
        .runCycle()
        .then((summary) => {
          if (summary.activities.length > 0 || summary.warnings.length > 0) {
            this.logger.log(
              `Poll cycle summary: groups=${summary.groupsScanned}, activities=${summary.activities.length}, warnings=${summary.warnings.length}, durationMs=${summary.durationMs}`,
            );
          }
        })
        .catch((err) => {
          this.logger.error('Unhandled error in poll cycle', err);
        });
    }, this.options.pollIntervalMs);

    this.schedulerRegistry.addInterval(POLL_INTERVAL_NAME, interval);
    this.logger.log(
      `Poll interval registered every ${this.options.pollIntervalMs}ms`,
    );
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', POLL_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(POLL_INTERVAL_NAME);
    }
  }
}
