import type { SpanLifecycle } from './span-lifecycle.js';

type StreamState = 'open' | 'closed';

/**
 * Async sequence returned in place of a streamed result. Each next() runs inside the call's
 * span; the span finishes when the source is exhausted, closed early through return(), or
 * fails. Consumed items become the call's result for hydration.
 */
export class TracedAsyncStream<T> implements AsyncIterableIterator<T> {
    private state: StreamState = 'open';
    private readonly consumed: T[] = [];
    private readonly iterator: AsyncIterator<T>;

    constructor(
        source: AsyncIterable<T>,
        private readonly lifecycle: SpanLifecycle
    ) {
        this.iterator = lifecycle.runInSpan(() => source[Symbol.asyncIterator]());
    }

    [Symbol.asyncIterator](): this {
        return this;
    }

    get items(): readonly T[] {
        return this.consumed;
    }

    async next(): Promise<IteratorResult<T>> {
        if (this.state === 'closed') {
            return { done: true, value: undefined };
        }

        let step: IteratorResult<T>;
        try {
            step = await this.lifecycle.runInSpan(() => this.iterator.next());
        } catch (error) {
            this.failWith(error);
            throw error;
        }

        if (step.done) {
            this.completeWithConsumed();
            return step;
        }
        this.consumed.push(step.value);
        return step;
    }

    async return(value?: unknown): Promise<IteratorResult<T>> {
        if (this.state === 'open') {
            try {
                await this.lifecycle.runInSpan(() => this.iterator.return?.(value));
            } catch (error) {
                this.failWith(error);
                throw error;
            }
            this.completeWithConsumed();
        }
        return { done: true, value };
    }

    async throw(error?: unknown): Promise<IteratorResult<T>> {
        if (this.state === 'closed') {
            throw error;
        }
        const forward = this.iterator.throw;
        if (!forward) {
            this.failWith(error);
            throw error;
        }

        let step: IteratorResult<T>;
        try {
            step = await this.lifecycle.runInSpan(() => forward.call(this.iterator, error));
        } catch (thrown) {
            this.failWith(thrown);
            throw thrown;
        }
        // The source caught the error and kept going
        if (step.done) {
            this.completeWithConsumed();
        } else {
            this.consumed.push(step.value);
        }
        return step;
    }

    private completeWithConsumed(): void {
        this.state = 'closed';
        this.lifecycle.complete(this.consumed);
        this.lifecycle.close(this.consumed);
    }

    private failWith(error: unknown): void {
        this.state = 'closed';
        this.lifecycle.fail(error);
        this.lifecycle.close(undefined);
    }
}

/**
 * Synchronous counterpart of TracedAsyncStream, for methods returning a generator
 */
export class TracedStream<T> implements IterableIterator<T> {
    private state: StreamState = 'open';
    private readonly consumed: T[] = [];
    private readonly iterator: Iterator<T>;

    constructor(
        source: Iterable<T>,
        private readonly lifecycle: SpanLifecycle
    ) {
        this.iterator = lifecycle.runInSpan(() => source[Symbol.iterator]());
    }

    [Symbol.iterator](): this {
        return this;
    }

    get items(): readonly T[] {
        return this.consumed;
    }

    next(): IteratorResult<T> {
        if (this.state === 'closed') {
            return { done: true, value: undefined };
        }

        let step: IteratorResult<T>;
        try {
            step = this.lifecycle.runInSpan(() => this.iterator.next());
        } catch (error) {
            this.failWith(error);
            throw error;
        }

        if (step.done) {
            this.completeWithConsumed();
            return step;
        }
        this.consumed.push(step.value);
        return step;
    }

    return(value?: unknown): IteratorResult<T> {
        if (this.state === 'open') {
            try {
                this.lifecycle.runInSpan(() => this.iterator.return?.(value));
            } catch (error) {
                this.failWith(error);
                throw error;
            }
            this.completeWithConsumed();
        }
        return { done: true, value };
    }

    throw(error?: unknown): IteratorResult<T> {
        if (this.state === 'closed') {
            throw error;
        }
        const forward = this.iterator.throw;
        if (!forward) {
            this.failWith(error);
            throw error;
        }

        let step: IteratorResult<T>;
        try {
            step = this.lifecycle.runInSpan(() => forward.call(this.iterator, error));
        } catch (thrown) {
            this.failWith(thrown);
            throw thrown;
        }
        if (step.done) {
            this.completeWithConsumed();
        } else {
            this.consumed.push(step.value);
        }
        return step;
    }

    private completeWithConsumed(): void {
        this.state = 'closed';
        this.lifecycle.complete(this.consumed);
        this.lifecycle.close(this.consumed);
    }

    private failWith(error: unknown): void {
        this.state = 'closed';
        this.lifecycle.fail(error);
        this.lifecycle.close(undefined);
    }
}
