/**
 * Deferred Task Scheduler
 *
 * Explicit deferred callbacks keyed to tick count or elapsed world time.
 * Used for multi-phase setup that must re-check an invariant after other
 * local subsystems finish initializing, without ever blocking a tick.
 */

export interface TaskHandle {
    readonly id: number;
}

type TaskFn = () => void;

interface ScheduledTask {
    id: number;
    fn: TaskFn;
    /** Tick on which the task becomes due (tick-keyed tasks) */
    dueTick?: number;
    /** World time at which the task becomes due (time-keyed tasks) */
    dueTime?: number;
}

/** Tolerance for accumulated float time */
const TIME_EPSILON = 1e-9;

export class TaskScheduler {
    private tasks: ScheduledTask[] = [];
    private nextId: number = 1;
    private _tick: number = 0;
    private _time: number = 0;

    /** Ticks advanced so far */
    get tick(): number {
        return this._tick;
    }

    /** Seconds advanced so far */
    get time(): number {
        return this._time;
    }

    /** Number of tasks still waiting */
    get pending(): number {
        return this.tasks.length;
    }

    /**
     * Run fn on the n-th following advance (n >= 1).
     */
    afterTicks(n: number, fn: TaskFn): TaskHandle {
        const task: ScheduledTask = { id: this.nextId++, fn, dueTick: this._tick + Math.max(1, Math.floor(n)) };
        this.tasks.push(task);
        return { id: task.id };
    }

    /**
     * Run fn on the first advance at which `seconds` of world time have elapsed.
     */
    afterSeconds(seconds: number, fn: TaskFn): TaskHandle {
        const task: ScheduledTask = { id: this.nextId++, fn, dueTime: this._time + Math.max(0, seconds) };
        this.tasks.push(task);
        return { id: task.id };
    }

    cancel(handle: TaskHandle): boolean {
        const index = this.tasks.findIndex(t => t.id === handle.id);
        if (index === -1) return false;
        this.tasks.splice(index, 1);
        return true;
    }

    /**
     * Advance one tick and run every task that became due, in scheduling order.
     * Tasks scheduled while this runs wait for the next advance.
     *
     * @returns Number of tasks run
     */
    advance(dt: number): number {
        this._tick++;
        this._time += dt;

        const due: ScheduledTask[] = [];
        const waiting: ScheduledTask[] = [];
        for (const task of this.tasks) {
            if (this.isDue(task)) {
                due.push(task);
            } else {
                waiting.push(task);
            }
        }
        this.tasks = waiting;

        for (const task of due) {
            task.fn();
        }
        return due.length;
    }

    clear(): void {
        this.tasks = [];
    }

    private isDue(task: ScheduledTask): boolean {
        if (task.dueTick !== undefined) {
            return this._tick >= task.dueTick;
        }
        return task.dueTime !== undefined && this._time + TIME_EPSILON >= task.dueTime;
    }
}

// ============================================
// Finite retry schedule
// ============================================

/**
 * A fixed number of re-check attempts at cumulative offsets, then done.
 */
export class RetrySchedule {
    private handles: TaskHandle[] = [];
    private _results: number[] = [];
    private _cancelled: boolean = false;

    constructor(
        private scheduler: TaskScheduler,
        private offsetsSeconds: readonly number[],
        private attempt: (index: number) => number,
        private onComplete?: (results: readonly number[]) => void
    ) {
        offsetsSeconds.forEach((offset, index) => {
            this.handles.push(scheduler.afterSeconds(offset, () => this.run(index)));
        });
    }

    /** Total attempts this schedule will make */
    get attempts(): number {
        return this.offsetsSeconds.length;
    }

    /** Value returned by each attempt made so far */
    get results(): readonly number[] {
        return this._results;
    }

    get done(): boolean {
        return this._cancelled || this._results.length === this.offsetsSeconds.length;
    }

    cancel(): void {
        if (this.done) return;
        this._cancelled = true;
        for (const handle of this.handles) {
            this.scheduler.cancel(handle);
        }
    }

    private run(index: number): void {
        this._results.push(this.attempt(index));
        if (this._results.length === this.offsetsSeconds.length) {
            this.onComplete?.(this._results);
        }
    }
}

/**
 * Schedule `attempt` once per offset (seconds from now).
 */
export function scheduleRetries(
    scheduler: TaskScheduler,
    offsetsSeconds: readonly number[],
    attempt: (index: number) => number,
    onComplete?: (results: readonly number[]) => void
): RetrySchedule {
    return new RetrySchedule(scheduler, offsetsSeconds, attempt, onComplete);
}
