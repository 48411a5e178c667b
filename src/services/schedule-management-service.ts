import { CronJob } from 'cron';
import { Logger } from '../util/logger';
import { isError } from '../util/error-handler';

export type JobName = 'tick' | 'cadence' | 'retention';

export const DEFAULT_JOB_PATTERNS: Record<JobName, string> = {
  tick: '0 */5 * * * *',      // every 5 minutes
  cadence: '0 1 * * * *',     // every hour at minute 1
  retention: '0 15 3 * * *'   // daily at 03:15
};

export interface JobStatus {
  running: boolean;
  nextRun: string | null;
  lastRun: string | null;
  cronPattern: string;
  executionCount: number;
}

export interface ScheduleExecutionResult {
  jobType: JobName;
  executionId: string;
  startTime: string;
  endTime: string;
  success: boolean;
  error?: string;
  duration: number;
}

type JobCallback = () => Promise<unknown>;

interface JobEntry {
  pattern: string;
  callback: JobCallback;
  cron: CronJob | null;
  lastRun: string | null;
  executionCount: number;
  active: boolean;
}

/**
 * Owns the cron jobs that drive the zones. A job never overlaps itself:
 * a tick that fires while the previous run is still busy is skipped.
 */
export class ScheduleManagementService {
  private readonly jobs = new Map<JobName, JobEntry>();
  private executionHistory: ScheduleExecutionResult[] = [];
  private readonly maxHistoryLength = 50;

  constructor(
    private readonly logger: Logger,
    private readonly timeZone: string,
    private readonly patterns: Partial<Record<JobName, string>> = {}
  ) { }

  register(name: JobName, callback: JobCallback): void {
    const existing = this.jobs.get(name);
    existing?.cron?.stop();
    this.jobs.set(name, {
      pattern: this.patterns[name] ?? DEFAULT_JOB_PATTERNS[name],
      callback,
      cron: null,
      lastRun: null,
      executionCount: 0,
      active: false
    });
  }

  start(): void {
    for (const [name, job] of this.jobs) {
      job.cron?.stop();
      job.cron = new CronJob(
        job.pattern,
        async () => {
          await this.execute(name);
        },
        null,
        true,
        this.timeZone
      );
      this.logger.log(`Scheduled ${name} job`, {
        pattern: job.pattern,
        timeZone: this.timeZone,
        nextRun: job.cron.nextDate().toISO()
      });
    }
  }

  stop(): void {
    for (const [name, job] of this.jobs) {
      if (job.cron) {
        job.cron.stop();
        job.cron = null;
        this.logger.log(`${name} job stopped`);
      }
    }
  }

  /**
   * Run a job outside its schedule.
   */
  async runNow(name: JobName): Promise<ScheduleExecutionResult | null> {
    return this.execute(name);
  }

  private async execute(name: JobName): Promise<ScheduleExecutionResult | null> {
    const job = this.jobs.get(name);
    if (!job) {
      this.logger.warn(`No ${name} job registered`);
      return null;
    }
    if (job.active) {
      this.logger.debug(`${name} job still running; skipping this run`);
      return null;
    }

    job.active = true;
    const started = Date.now();
    const startTime = new Date(started).toISOString();
    const executionId = `${name}_${started}`;
    let error: string | undefined;

    try {
      await job.callback();
    } catch (caught) {
      error = isError(caught) ? caught.message : String(caught);
      this.logger.error(`${name} job failed`, caught, { executionId });
    } finally {
      job.active = false;
    }

    job.lastRun = startTime;
    job.executionCount++;
    const result: ScheduleExecutionResult = {
      jobType: name,
      executionId,
      startTime,
      endTime: new Date().toISOString(),
      success: error === undefined,
      error,
      duration: Date.now() - started
    };
    this.addExecutionHistory(result);
    return result;
  }

  private addExecutionHistory(result: ScheduleExecutionResult): void {
    this.executionHistory.push(result);
    if (this.executionHistory.length > this.maxHistoryLength) {
      this.executionHistory = this.executionHistory.slice(-this.maxHistoryLength);
    }
  }

  getExecutionHistory(limit?: number): ScheduleExecutionResult[] {
    const history = [...this.executionHistory].reverse();
    return limit ? history.slice(0, limit) : history;
  }

  getStatus(): Partial<Record<JobName, JobStatus>> {
    const status: Partial<Record<JobName, JobStatus>> = {};
    for (const [name, job] of this.jobs) {
      status[name] = {
        running: job.cron !== null,
        nextRun: job.cron ? job.cron.nextDate().toISO() : null,
        lastRun: job.lastRun,
        cronPattern: job.pattern,
        executionCount: job.executionCount
      };
    }
    return status;
  }
}
