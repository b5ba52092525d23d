/**
 * Notification Dispatcher
 *
 * Fans each published event out to the targets subscribed to its type.
 * Deliveries run on a bounded async pool; each message is retried with
 * backoff and a final failure is recorded, never thrown. The monitor calls
 * `collect()` after each cycle for what has finished so far, and `drain()`
 * only at shutdown.
 */

import { DELIVERY } from '../config';
import { ConcurrencyLimiter } from '../concurrency';
import { FetchFn, isRetryable } from '../http';
import { createLogger, errorMessage, Logger } from '../logger';
import { RetryExhaustedError, RetryPolicy, withRetry } from '../retry';
import { ErrorFactory, StructuredError, toLogData } from '../structured_error';
import { formatEvent } from './formatters';
import { sendMessage } from './transport';
import {
    acceptsEvent,
    DrainReport,
    EventSink,
    eventTypeOf,
    Message,
    NotificationEvent,
    NotificationEventType,
    NotificationTarget,
} from './types';

export interface DispatcherOptions {
    targets: NotificationTarget[];
    /** Mentioned on discord error messages when the target sets none. */
    errorMention?: string | null;
    fetchFn?: FetchFn;
    timeoutMs?: number;
    retry?: Partial<RetryPolicy>;
    maxWorkers?: number;
    logger?: Logger;
}

export class NotificationDispatcher implements EventSink {
    private readonly fetchFn: FetchFn;
    private readonly timeoutMs: number;
    private readonly policy: RetryPolicy;
    private readonly limiter: ConcurrencyLimiter;
    private readonly log: Logger;
    private readonly inFlight = new Set<Promise<void>>();

    private delivered = 0;
    private failed: StructuredError[] = [];

    constructor(private readonly opts: DispatcherOptions) {
        this.fetchFn = opts.fetchFn ?? fetch;
        this.timeoutMs = opts.timeoutMs ?? DELIVERY.TIMEOUT_MS;
        this.log = opts.logger ?? createLogger('notify');
        this.policy = {
            maxAttempts: DELIVERY.MAX_ATTEMPTS,
            minMs: DELIVERY.BACKOFF_MIN_MS,
            maxMs: DELIVERY.BACKOFF_MAX_MS,
            retryable: isRetryable,
            ...opts.retry,
        };
        const workers = opts.maxWorkers ?? Math.min(DELIVERY.MAX_WORKERS, Math.max(opts.targets.length, 1));
        this.limiter = new ConcurrencyLimiter(workers);
    }

    get pending(): number {
        return this.inFlight.size;
    }

    private mentionFor(target: NotificationTarget, event: NotificationEvent): string | null {
        if (event.kind !== 'error') return null;
        return target.mention ?? (target.service === 'discord' ? this.opts.errorMention ?? null : null);
    }

    publish(event: NotificationEvent): void {
        const type = eventTypeOf(event);
        for (const target of this.opts.targets) {
            if (!acceptsEvent(target, type)) continue;
            const messages = formatEvent(event, { service: target.service, mention: this.mentionFor(target, event) });
            const job: Promise<void> = this.deliver(target, type, messages).then(() => {
                this.inFlight.delete(job);
            });
            this.inFlight.add(job);
        }
    }

    /** Send every message in order; the first message that exhausts its retries abandons the rest. */
    private async deliver(target: NotificationTarget, type: NotificationEventType, messages: Message[]): Promise<void> {
        await this.limiter.acquireSlot();
        try {
            for (const msg of messages) {
                await withRetry(() => sendMessage(this.fetchFn, target, msg, this.timeoutMs), {
                    ...this.policy,
                    onRetry: (attempt, waitMs, err) =>
                        this.log.warn('Notification delivery failed, retrying', {
                            target: target.name,
                            event: type,
                            attempt,
                            wait_ms: waitMs,
                            error: errorMessage(err),
                        }),
                });
                this.delivered++;
            }
            this.log.debug('Notification delivered', { target: target.name, event: type, messages: messages.length });
        } catch (e) {
            const attempts = e instanceof RetryExhaustedError ? e.attempts : 1;
            const last = e instanceof RetryExhaustedError ? e.lastError : e;
            const err = ErrorFactory.deliveryFailed(target.name, type, attempts, errorMessage(last));
            this.failed.push(err);
            this.log.error(err.message, toLogData(err));
        } finally {
            this.limiter.releaseSlot();
        }
    }

    collect(): DrainReport {
        const report = { delivered: this.delivered, failed: this.failed };
        this.delivered = 0;
        this.failed = [];
        return report;
    }

    /** Wait for every queued delivery, then report and reset the counters. */
    async drain(): Promise<DrainReport> {
        while (this.inFlight.size > 0) {
            await Promise.all([...this.inFlight]);
        }
        return this.collect();
    }
}
