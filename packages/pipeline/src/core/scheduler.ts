import type { LoggerMethods } from '@propscan/logger';
import type { PipelineStage, Task } from '@propscan/model';

import type { DocumentStore, EligibilityPolicy } from '../store/document-store';
import type { PipelineRunner, RunResult } from './types';

import { PropscanError, Semaphore, sleep } from '@propscan/shared';

import { SCHEDULER, TASK_PRIORITY } from '../config/constants';
import { DocumentBusyError } from '../errors/pipeline-errors';
import { TaskQueue } from '../queue/task-queue';

/** Options for Scheduler */
export interface SchedulerOptions {
  logger: LoggerMethods;
  store: DocumentStore;
  engine: PipelineRunner;

  /**
   * Maximum pipeline runs in flight (default: 3)
   */
  concurrency?: number;

  /**
   * Eligible documents fetched per poll (default: 10)
   */
  batchSize?: number;

  /**
   * Idle wait between polls in milliseconds (default: 1000)
   */
  pollIntervalMs?: number;

  /**
   * Stuck `processing` documents are skipped at this retry count (default: 5)
   */
  retryLimit?: number;

  /**
   * Skip documents entirely at this retry count (default: unlimited)
   */
  attemptLimit?: number;

  /**
   * Skip documents after this many empty OCR results (default: unlimited)
   */
  softFailureLimit?: number;

  /**
   * Clock for task timestamps (default: Date.now)
   */
  now?: () => number;
}

export interface EnqueueOptions {
  /**
   * Manual tasks run ahead of automatic ones (default: true)
   */
  manual?: boolean;
  priority?: number;
}

export interface SchedulerStatus {
  running: boolean;
  inFlight: number;
  queued: number;
  concurrency: number;
}

/**
 * Scheduler
 *
 * Polls the store for eligible documents and runs them through the pipeline
 * with bounded concurrency. Tasks live only in memory; after a restart the
 * working set is rebuilt from the store.
 *
 * A document is never dispatched while a run for it is in flight. The check
 * and the in-flight insertion happen synchronously in the dispatch loop.
 */
export class Scheduler {
  private readonly logger: LoggerMethods;
  private readonly store: DocumentStore;
  private readonly engine: PipelineRunner;
  private readonly concurrency: number;
  private readonly batchSize: number;
  private readonly pollIntervalMs: number;
  private readonly policy: EligibilityPolicy;
  private readonly now: () => number;

  private readonly queue = new TaskQueue();
  private readonly inFlight = new Map<number, Promise<void>>();
  private readonly semaphore: Semaphore;
  private running = false;
  private loopPromise: Promise<void> | null = null;
  private wakeController = new AbortController();

  constructor(options: SchedulerOptions) {
    this.logger = options.logger;
    this.store = options.store;
    this.engine = options.engine;
    this.concurrency = options.concurrency ?? SCHEDULER.CONCURRENCY;
    this.batchSize = options.batchSize ?? SCHEDULER.BATCH_SIZE;
    this.pollIntervalMs = options.pollIntervalMs ?? SCHEDULER.POLL_INTERVAL_MS;
    this.policy = {
      retryLimit: options.retryLimit ?? SCHEDULER.RETRY_LIMIT,
      attemptLimit: options.attemptLimit,
      softFailureLimit: options.softFailureLimit,
    };
    this.now = options.now ?? Date.now;
    this.semaphore = new Semaphore(this.concurrency);
  }

  /**
   * Reset stale `processing` stages, then start polling
   */
  start(): void {
    if (this.running) {
      return;
    }

    const healed = this.store.resetStaleProcessing();
    if (healed > 0) {
      this.logger.warn(
        `[Scheduler] Reset ${healed} document(s) left in processing`,
      );
    }

    this.running = true;
    this.logger.info(
      `[Scheduler] Started (concurrency ${this.concurrency}, poll ${this.pollIntervalMs}ms)`,
    );
    this.loopPromise = this.loop();
  }

  /**
   * Stop admitting work and resolve once every in-flight run has finished
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.wake();
    this.logger.info(
      `[Scheduler] Stopping, waiting for ${this.inFlight.size} run(s) in flight`,
    );

    await this.loopPromise;
    await Promise.all(this.inFlight.values());
    this.queue.clear();
    this.loopPromise = null;

    this.logger.info('[Scheduler] Stopped');
  }

  /**
   * Queue a document for a run, ahead of polled work unless `manual` is false
   */
  enqueue(documentId: number, options: EnqueueOptions = {}): void {
    const manual = options.manual ?? true;
    this.queue.push({
      documentId,
      manual,
      priority:
        options.priority ??
        (manual ? TASK_PRIORITY.MANUAL : TASK_PRIORITY.DEFAULT),
      enqueuedAt: this.now(),
    });
    this.wake();
  }

  /**
   * Reset a stage in the store and queue a manual run.
   *
   * `ocr` restarts the whole pipeline; `llm` redoes only extraction.
   *
   * @throws DocumentBusyError when a run for the document is in flight
   * @throws DocumentNotFoundError for an unknown id
   */
  reprocess(documentId: number, stage: PipelineStage): void {
    if (this.inFlight.has(documentId)) {
      throw new DocumentBusyError(documentId);
    }

    if (stage === 'ocr') {
      this.store.resetOcrStatus(documentId);
    } else {
      this.store.resetLlmStatus(documentId);
    }
    this.logger.info(
      `[Scheduler] [doc:${documentId}] Reset ${stage} stage for reprocessing`,
    );
    this.enqueue(documentId);
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.running,
      inFlight: this.inFlight.size,
      queued: this.queue.size,
      concurrency: this.concurrency,
    };
  }

  /**
   * Poll the store once and dispatch as much queued work as permits allow
   *
   * @returns number of runs started
   */
  runCycle(): number {
    const documents = this.store.getEligibleDocuments(
      this.batchSize,
      this.policy,
    );

    for (const document of documents) {
      if (this.inFlight.has(document.id)) {
        continue;
      }
      this.queue.push({
        documentId: document.id,
        manual: false,
        priority: document.favorite
          ? TASK_PRIORITY.FAVORITE
          : TASK_PRIORITY.DEFAULT,
        enqueuedAt: this.now(),
      });
    }

    return this.dispatch();
  }

  private async loop(): Promise<void> {
    while (this.running) {
      this.wakeController = new AbortController();

      try {
        this.runCycle();
      } catch (error) {
        this.logger.error(
          `[Scheduler] Poll failed: ${PropscanError.getErrorMessage(error)}`,
        );
      }

      if (!this.running) {
        break;
      }
      // Completions, enqueues and stop() abort the wait early
      await sleep(this.pollIntervalMs, this.wakeController.signal);
    }
  }

  private dispatch(): number {
    const deferred: Task[] = [];
    let started = 0;

    while (this.running && this.semaphore.available > 0) {
      const task = this.queue.shift();
      if (!task) {
        break;
      }
      if (this.inFlight.has(task.documentId)) {
        deferred.push(task);
        continue;
      }
      this.launch(task);
      started++;
    }

    for (const task of deferred) {
      this.queue.push(task);
    }
    return started;
  }

  private launch(task: Task): void {
    const { documentId } = task;

    const run = this.semaphore
      .use(() => this.execute(task))
      .then((result) => {
        this.inFlight.delete(documentId);
        if (result?.requeue && this.running) {
          this.queue.push({ ...task, enqueuedAt: this.now() });
        }
        // Deferred runs wait for the next poll
        if (result?.outcome !== 'llm-deferred') {
          this.wake();
        }
      });

    this.inFlight.set(documentId, run);
  }

  private async execute(task: Task): Promise<RunResult | null> {
    const tag = `[Scheduler] [doc:${task.documentId}]`;
    this.logger.debug(
      `${tag} Dispatching (${task.manual ? 'manual' : 'automatic'}, priority ${task.priority})`,
    );

    try {
      const result = await this.engine.run(task.documentId);
      this.logger.debug(`${tag} Run finished: ${result.outcome}`);
      return result;
    } catch (error) {
      this.logger.error(
        `${tag} Run crashed: ${PropscanError.getErrorMessage(error)}`,
      );
      return null;
    }
  }

  private wake(): void {
    this.wakeController.abort();
  }
}
