import { NotFoundError, SchedulerJobError, ValidationError } from '../errors';

export type JobState = 'idle' | 'running';

export interface JobStatus {
  name: string;
  intervalMs: number;
  state: JobState;
  lastStartedAt: string | null;
  lastFinishedAt: string | null;
  lastDurationMs: number | null;
  lastError: string | null;
  runCount: number;
  failureCount: number;
  skipCount: number;
}

/**
 * A job body. It should check `signal.aborted` between units of work and
 * return early once the scheduler is stopping.
 */
export type JobRun = (signal: AbortSignal) => Promise<void>;

export interface JobRunResult {
  job: string;
  outcome: 'completed' | 'failed' | 'skipped';
  durationMs: number;
  error?: string;
}

export interface SchedulerOptions {
  tickMs: number;
  stopTimeoutMs: number;
}

interface JobEntry {
  status: JobStatus;
  run: JobRun;
  inFlight: Promise<JobRunResult> | null;
}

/**
 * Refresh scheduler - runs registered jobs on independent cadences.
 *
 * Each job cycles idle -> running -> idle. A trigger that arrives while the job
 * is running is skipped. A failing run is recorded and logged; it never stops
 * the loop or other jobs.
 */
export class RefreshScheduler {
  private jobs = new Map<string, JobEntry>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private controller = new AbortController();

  constructor(
    private options: SchedulerOptions,
    private now: () => Date = () => new Date()
  ) {}

  register(name: string, intervalMs: number, run: JobRun): void {
    if (this.jobs.has(name)) {
      throw new ValidationError(`Job ${name} is already registered`);
    }
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new ValidationError(`Job ${name}: intervalMs must be positive, got ${intervalMs}`);
    }

    this.jobs.set(name, {
      status: {
        name,
        intervalMs,
        state: 'idle',
        lastStartedAt: null,
        lastFinishedAt: null,
        lastDurationMs: null,
        lastError: null,
        runCount: 0,
        failureCount: 0,
        skipCount: 0,
      },
      run,
      inFlight: null,
    });
  }

  isStarted(): boolean {
    return this.timer !== null;
  }

  /**
   * Start the tick loop. Calling start on a started scheduler does nothing.
   */
  start(): void {
    if (this.timer) return;

    if (this.controller.signal.aborted) {
      this.controller = new AbortController();
    }

    console.log(`[Scheduler] Starting with ${this.jobs.size} jobs, tick every ${this.options.tickMs}ms`);
    this.timer = setInterval(() => this.tick(), this.options.tickMs);
    this.tick();
  }

  /**
   * Stop ticking, signal running jobs and wait for them to reach a checkpoint.
   * Gives up waiting after `timeoutMs`.
   */
  async stop(timeoutMs: number = this.options.stopTimeoutMs): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller.abort();

    const running = [...this.jobs.values()].filter((job) => job.inFlight !== null);
    if (running.length === 0) {
      console.log('[Scheduler] Stopped');
      return;
    }

    console.log(`[Scheduler] Waiting for ${running.length} running jobs...`);

    let timeout: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timeout = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    const result = await Promise.race([
      Promise.all(running.map((job) => job.inFlight)).then(() => 'done' as const),
      timedOut,
    ]);
    clearTimeout(timeout);

    if (result === 'timeout') {
      const names = running.filter((job) => job.inFlight !== null).map((job) => job.status.name);
      console.error(`[Scheduler] Force-stopped after ${timeoutMs}ms with jobs still running: ${names.join(', ')}`);
    } else {
      console.log('[Scheduler] Stopped');
    }
  }

  /**
   * Trigger a job immediately, outside its cadence.
   * Works on a stopped scheduler: the run gets a fresh signal of its own.
   */
  runNow(name: string): Promise<JobRunResult> {
    const job = this.jobs.get(name);
    if (!job) {
      throw new NotFoundError('Job', name);
    }
    if (!this.timer && this.controller.signal.aborted) {
      this.controller = new AbortController();
    }
    return this.trigger(job);
  }

  getJobs(): JobStatus[] {
    return [...this.jobs.values()].map((job) => ({ ...job.status }));
  }

  private tick(): void {
    const now = this.now().getTime();

    for (const job of this.jobs.values()) {
      const { lastStartedAt, intervalMs } = job.status;
      const due = lastStartedAt === null || now - new Date(lastStartedAt).getTime() >= intervalMs;
      if (!due) continue;

      // Outcome is recorded on the job status
      void this.trigger(job);
    }
  }

  private trigger(job: JobEntry): Promise<JobRunResult> {
    if (job.inFlight) {
      job.status.skipCount++;
      console.log(`[Scheduler] Skipping ${job.status.name}: previous run still in progress`);
      return Promise.resolve({ job: job.status.name, outcome: 'skipped', durationMs: 0 });
    }

    const flight = this.execute(job).finally(() => {
      job.inFlight = null;
    });
    job.inFlight = flight;
    return flight;
  }

  private async execute(job: JobEntry): Promise<JobRunResult> {
    const { status } = job;
    const startedAt = this.now();

    status.state = 'running';
    status.lastStartedAt = startedAt.toISOString();
    status.runCount++;
    console.log(`[Scheduler] Running ${status.name}`);

    let result: JobRunResult;
    try {
      await job.run(this.controller.signal);
      status.lastError = null;
      result = { job: status.name, outcome: 'completed', durationMs: this.now().getTime() - startedAt.getTime() };
    } catch (error) {
      const failure = new SchedulerJobError(status.name, error);
      status.failureCount++;
      status.lastError = failure.message;
      console.error(`[Scheduler] ${failure.message}`, failure.cause);
      result = {
        job: status.name,
        outcome: 'failed',
        durationMs: this.now().getTime() - startedAt.getTime(),
        error: failure.message,
      };
    }

    status.state = 'idle';
    status.lastFinishedAt = this.now().toISOString();
    status.lastDurationMs = result.durationMs;
    console.log(`[Scheduler] ${status.name} ${result.outcome} in ${result.durationMs}ms`);

    return result;
  }
}
