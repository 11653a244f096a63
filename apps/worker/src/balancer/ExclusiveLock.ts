import Bottleneck from "bottleneck";

/**
 * FIFO mutual exclusion for async critical sections.
 *
 * A Bottleneck limiter with a single slot: queued sections run one at a time
 * in submission order, so a check-then-mutate inside run() never interleaves
 * with another.
 */
export class ExclusiveLock {
    private limiter = new Bottleneck({ maxConcurrent: 1 });

    run<R>(section: () => Promise<R>): Promise<R> {
        return this.limiter.schedule(section);
    }

    /**
     * Sections waiting for or holding the lock.
     */
    pending(): number {
        const counts = this.limiter.counts();
        return counts.RECEIVED + counts.QUEUED + counts.RUNNING + counts.EXECUTING;
    }
}
